import type { PerformanceConfig } from '@/config/schema';

/**
 * Anything a host may hand to `register`:
 * - a string (`provider::model`, `provider:credential`, `provider`, or a JSON object)
 * - key/value pairs as a flat string array (`['format', 'openai', 'model', '...']`)
 * - an object, canonical or free-form
 */
export type ConfigInput = string | readonly string[] | Readonly<Record<string, unknown>>;

/** Input after JSON strings and key/value pairs have been unfolded. */
export type NormalizedInput =
  | { kind: 'text'; text: string }
  | { kind: 'object'; value: Record<string, unknown> };

/**
 * What a grammar extracts before provider validation, defaults and
 * credential lookup are applied.
 */
export interface RawClientConfig {
  provider: string;
  model?: string;
  credential?: string;
  endpoint?: string;
  dimensions?: number;
  normalize?: boolean;
  visionModel?: string;
  performance: Partial<PerformanceConfig>;
}

export type GrammarName = 'canonical' | 'compact' | 'free-form';

export interface ConfigGrammar {
  readonly name: GrammarName;
  /**
   * Returns null when the input is not in this grammar's form.
   * Throws ConfigError when the form matches but the content is invalid.
   */
  parse(input: NormalizedInput, clientName: string): RawClientConfig | null;
}

export interface ResolveOptions {
  /** Name the client is registered under; used in error messages */
  clientName?: string;
  /** Environment consulted for credentials (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Defaults for performance fields the input leaves out */
  performance?: PerformanceConfig;
}
