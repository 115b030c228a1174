/**
 * Configuration Grammars
 *
 * The accepted surface forms of a client configuration, in precedence order.
 * Each grammar recognises its own form and extracts a RawClientConfig; the
 * resolver takes the first grammar that recognises the input.
 *
 * 1. canonical  { provider, model, credential?, endpoint?, visionModel?, performance?, ... }
 * 2. compact    "provider::model" | "provider:credential" | "provider"
 * 3. free-form  { provider|format, model|embedding_model, key|api_key, vision_model, url, ... }
 */

import { z } from 'zod';
import { performanceSchema } from '@/config/schema';
import { ConfigError } from '../errors';
import type { ConfigGrammar, NormalizedInput, RawClientConfig } from './types';

const MODEL_SEPARATOR = '::';
const CREDENTIAL_SEPARATOR = ':';

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`).join('; ');
}

function malformed(clientName: string, detail: string): ConfigError {
  return new ConfigError(
    `Malformed configuration for client '${clientName}': ${detail}`,
    'MALFORMED_INPUT',
    clientName
  );
}

/**
 * Split "provider::model". Returns null when the separator is absent.
 */
export function splitQualifiedModel(value: string): { provider: string; model: string } | null {
  const index = value.indexOf(MODEL_SEPARATOR);
  if (index === -1) return null;
  return {
    provider: value.slice(0, index).trim(),
    model: value.slice(index + MODEL_SEPARATOR.length).trim()
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Canonical
// ═══════════════════════════════════════════════════════════════════════════════

const canonicalSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    credential: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    dimensions: z.number().int().positive().optional(),
    normalize: z.boolean().optional(),
    visionModel: z.string().min(1).optional(),
    performance: performanceSchema.partial().strict().optional()
  })
  .strict();

const CANONICAL_KEYS: ReadonlySet<string> = new Set(Object.keys(canonicalSchema.shape));

const canonicalGrammar: ConfigGrammar = {
  name: 'canonical',
  parse(input, clientName) {
    if (input.kind !== 'object') return null;
    const keys = Object.keys(input.value);
    const isCanonicalShape =
      keys.includes('provider') && keys.includes('model') && keys.every((key) => CANONICAL_KEYS.has(key));
    if (!isCanonicalShape) return null;

    const result = canonicalSchema.safeParse(input.value);
    if (!result.success) throw malformed(clientName, formatIssues(result.error));

    const { performance, ...rest } = result.data;
    return { ...rest, performance: performance ?? {} };
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Compact
// ═══════════════════════════════════════════════════════════════════════════════

const BARE_PROVIDER = /^[A-Za-z][\w-]*$/;

const compactGrammar: ConfigGrammar = {
  name: 'compact',
  parse(input, clientName) {
    if (input.kind !== 'text') return null;
    const text = input.text.trim();

    const qualified = splitQualifiedModel(text);
    if (qualified) {
      if (!qualified.provider || !qualified.model) {
        throw malformed(clientName, `expected "provider::model", got "${text}"`);
      }
      return { provider: qualified.provider, model: qualified.model, performance: {} };
    }

    const index = text.indexOf(CREDENTIAL_SEPARATOR);
    if (index !== -1) {
      const provider = text.slice(0, index).trim();
      const credential = text.slice(index + CREDENTIAL_SEPARATOR.length).trim();
      if (!provider || !credential) {
        throw malformed(clientName, 'expected "provider:credential" with both parts present');
      }
      return { provider, credential, performance: {} };
    }

    if (BARE_PROVIDER.test(text)) {
      return { provider: text, performance: {} };
    }

    return null;
  }
};

// ═══════════════════════════════════════════════════════════════════════════════
// Free-form
// ═══════════════════════════════════════════════════════════════════════════════

const nonEmpty = z.string().trim().min(1);
const flag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')
]);

const freeFormSchema = z.object({
  provider: nonEmpty.optional(),
  format: nonEmpty.optional(),
  model: nonEmpty.optional(),
  embedding_model: nonEmpty.optional(),
  key: nonEmpty.optional(),
  api_key: nonEmpty.optional(),
  vision_model: nonEmpty.optional(),
  url: z.string().url().optional(),
  base_url: z.string().url().optional(),
  endpoint: z.string().url().optional(),
  dimensions: z.coerce.number().int().positive().optional(),
  normalize: flag.optional(),
  max_concurrency: z.coerce.number().int().min(1).optional(),
  /** Seconds */
  request_timeout: z.coerce.number().positive().optional(),
  stream_batch_size: z.coerce.number().int().min(1).optional()
});

const FREE_FORM_KEYS: ReadonlySet<string> = new Set(Object.keys(freeFormSchema.shape));

/**
 * First of several synonymous fields. Synonyms that disagree are ambiguous.
 */
function pickOne(
  clientName: string,
  field: string,
  candidates: ReadonlyArray<readonly [string, string | undefined]>
): string | undefined {
  let chosen: readonly [string, string] | undefined;
  for (const [key, value] of candidates) {
    if (value === undefined) continue;
    if (!chosen) {
      chosen = [key, value];
    } else if (chosen[1] !== value) {
      throw malformed(clientName, `ambiguous ${field}: '${chosen[0]}' and '${key}' disagree`);
    }
  }
  return chosen?.[1];
}

const freeFormGrammar: ConfigGrammar = {
  name: 'free-form',
  parse(input, clientName) {
    if (input.kind !== 'object') return null;
    if (!Object.keys(input.value).some((key) => FREE_FORM_KEYS.has(key))) return null;

    const result = freeFormSchema.safeParse(input.value);
    if (!result.success) throw malformed(clientName, formatIssues(result.error));
    const data = result.data;

    let provider = pickOne(clientName, 'provider', [
      ['provider', data.provider],
      ['format', data.format]
    ]);
    let model = pickOne(clientName, 'model', [
      ['model', data.model],
      ['embedding_model', data.embedding_model]
    ]);

    const qualified = model === undefined ? null : splitQualifiedModel(model);
    if (qualified) {
      if (!qualified.provider || !qualified.model) {
        throw malformed(clientName, `expected "provider::model", got "${model}"`);
      }
      provider = pickOne(clientName, 'provider', [
        ['provider', provider],
        ['model prefix', qualified.provider]
      ]);
      model = qualified.model;
    }

    if (provider === undefined) {
      throw malformed(clientName, 'no provider given (use "provider", "format" or a "provider::model" model)');
    }

    const raw: RawClientConfig = {
      provider,
      performance: {
        ...(data.max_concurrency !== undefined ? { maxConcurrency: data.max_concurrency } : {}),
        ...(data.request_timeout !== undefined
          ? { requestTimeoutMs: Math.round(data.request_timeout * 1000) }
          : {}),
        ...(data.stream_batch_size !== undefined ? { streamBatchSize: data.stream_batch_size } : {})
      }
    };

    const credential = pickOne(clientName, 'credential', [
      ['key', data.key],
      ['api_key', data.api_key]
    ]);
    const endpoint = pickOne(clientName, 'endpoint', [
      ['url', data.url],
      ['base_url', data.base_url],
      ['endpoint', data.endpoint]
    ]);

    if (model !== undefined) raw.model = model;
    if (credential !== undefined) raw.credential = credential;
    if (endpoint !== undefined) raw.endpoint = endpoint;
    if (data.dimensions !== undefined) raw.dimensions = data.dimensions;
    if (data.normalize !== undefined) raw.normalize = data.normalize;
    if (data.vision_model !== undefined) raw.visionModel = data.vision_model;

    return raw;
  }
};

/** Precedence order; the first grammar that recognises the input wins. */
export const grammars: readonly ConfigGrammar[] = [canonicalGrammar, compactGrammar, freeFormGrammar];

/**
 * Unfold JSON strings and key/value pair arrays into objects.
 */
export function normalizeInput(input: unknown, clientName: string): NormalizedInput {
  if (typeof input === 'string') {
    const trimmed = input.trim();
    if (!trimmed) throw malformed(clientName, 'configuration is empty');
    if (!trimmed.startsWith('{')) return { kind: 'text', text: trimmed };

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      throw malformed(clientName, 'configuration looks like JSON but does not parse');
    }
    return normalizeInput(parsed, clientName);
  }

  if (Array.isArray(input)) {
    if (input.length % 2 !== 0) {
      throw malformed(clientName, 'key/value pairs must have an even number of entries');
    }
    const value: Record<string, unknown> = {};
    for (let i = 0; i < input.length; i += 2) {
      const key: unknown = input[i];
      if (typeof key !== 'string' || !key) {
        throw malformed(clientName, `key at position ${i} is not a non-empty string`);
      }
      value[key] = input[i + 1];
    }
    return { kind: 'object', value };
  }

  if (typeof input === 'object' && input !== null) {
    return { kind: 'object', value: { ...input } };
  }

  throw malformed(clientName, `unsupported configuration type '${typeof input}'`);
}
