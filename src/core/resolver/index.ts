/**
 * Config Resolver
 *
 * Turns a ConfigInput into a canonical ClientDescriptor. Parsing is delegated
 * to the ordered grammar list; this module applies what every form shares:
 * provider validation, default models, credential fallback, vision model
 * resolution and performance defaults. Every failure is a ConfigError thrown
 * synchronously.
 */

import {
  DEFAULT_PERFORMANCE,
  type EmbeddingProvider,
  embeddingProviders,
  type KnownProvider,
  type PerformanceConfig,
  performanceSchema,
  providerAliases,
  type VisionProvider,
  visionProviders
} from '@/config/schema';
import { ConfigError } from '../errors';
import type { ClientDescriptor, VisionDescriptor } from '../types';
import { credentialEnvVars, lookupCredential, requiresCredential } from './credentials';
import { grammars, normalizeInput, splitQualifiedModel } from './grammars';
import type { ConfigInput, RawClientConfig, ResolveOptions } from './types';

export type { ConfigInput, ResolveOptions } from './types';

/** Model used when the configuration names a provider but no model. */
const DEFAULT_EMBEDDING_MODELS: Readonly<Partial<Record<EmbeddingProvider, string>>> = {
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
  cohere: 'embed-english-v3.0',
  mistral: 'mistral-embed',
  ollama: 'nomic-embed-text'
};

const UNNAMED_CLIENT = '<unnamed>';

function canonicalProviderName(name: string): string {
  const lowered = name.trim().toLowerCase();
  return providerAliases[lowered] ?? lowered;
}

function isEmbeddingProvider(name: string): name is EmbeddingProvider {
  return embeddingProviders.some((provider) => provider === name);
}

function isVisionProvider(name: string): name is VisionProvider {
  return visionProviders.some((provider) => provider === name);
}

function missingCredential(provider: KnownProvider, clientName: string): ConfigError {
  return new ConfigError(
    `No credential for provider '${provider}' of client '${clientName}'. ` +
      `Pass one in the configuration or set ${credentialEnvVars(provider).join(' or ')}.`,
    'MISSING_CREDENTIAL',
    clientName
  );
}

/**
 * Resolve any accepted configuration form into a ClientDescriptor.
 * Deterministic for a given input and environment.
 */
export function resolveClientConfig(input: ConfigInput, options: ResolveOptions = {}): ClientDescriptor {
  const clientName = options.clientName ?? UNNAMED_CLIENT;
  const normalized = normalizeInput(input, clientName);

  for (const grammar of grammars) {
    const raw = grammar.parse(normalized, clientName);
    if (raw) return finalize(raw, clientName, options);
  }

  throw new ConfigError(
    `Malformed configuration for client '${clientName}': expected "provider::model", ` +
      '"provider:credential", or an object with provider/model/key fields',
    'MALFORMED_INPUT',
    clientName
  );
}

function finalize(raw: RawClientConfig, clientName: string, options: ResolveOptions): ClientDescriptor {
  const env = options.env ?? process.env;

  const provider = canonicalProviderName(raw.provider);
  if (!isEmbeddingProvider(provider)) {
    throw new ConfigError(
      `Unknown provider '${raw.provider}' for client '${clientName}'. ` +
        `Expected one of: ${embeddingProviders.join(', ')}`,
      'UNKNOWN_PROVIDER',
      clientName
    );
  }

  const model = raw.model ?? DEFAULT_EMBEDDING_MODELS[provider];
  if (!model) {
    throw new ConfigError(
      `Client '${clientName}': provider '${provider}' has no default model; name one`,
      'MALFORMED_INPUT',
      clientName
    );
  }

  if (provider === 'openai-compatible' && !raw.endpoint) {
    throw new ConfigError(
      `Client '${clientName}': provider 'openai-compatible' requires an endpoint`,
      'MALFORMED_INPUT',
      clientName
    );
  }

  const credential = raw.credential ?? lookupCredential(provider, env);
  if (!credential && requiresCredential(provider)) {
    throw missingCredential(provider, clientName);
  }

  const performance = resolvePerformance(raw, clientName, options.performance ?? DEFAULT_PERFORMANCE);

  const descriptor: ClientDescriptor = {
    provider,
    model,
    normalize: raw.normalize ?? false,
    performance,
    dedicatedBudget: raw.performance.maxConcurrency !== undefined
  };
  if (credential) descriptor.credential = credential;
  if (raw.endpoint) descriptor.endpoint = raw.endpoint;
  if (raw.dimensions !== undefined) descriptor.dimensions = raw.dimensions;
  if (raw.visionModel) {
    descriptor.vision = resolveVision(raw.visionModel, descriptor, clientName, env);
  }

  return descriptor;
}

function resolvePerformance(
  raw: RawClientConfig,
  clientName: string,
  defaults: PerformanceConfig
): PerformanceConfig {
  const result = performanceSchema.safeParse({
    maxConcurrency: raw.performance.maxConcurrency ?? defaults.maxConcurrency,
    requestTimeoutMs: raw.performance.requestTimeoutMs ?? defaults.requestTimeoutMs,
    streamBatchSize: raw.performance.streamBatchSize ?? defaults.streamBatchSize
  });
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(
      `Invalid performance settings for client '${clientName}': ${detail}`,
      'MALFORMED_INPUT',
      clientName
    );
  }
  return result.data;
}

/**
 * A bare vision model runs on the embedding provider with its credential and
 * endpoint. A "provider::model" vision model on another provider gets that
 * provider's environment credential and default endpoint.
 */
function resolveVision(
  visionModel: string,
  embedding: ClientDescriptor,
  clientName: string,
  env: NodeJS.ProcessEnv
): VisionDescriptor {
  const qualified = splitQualifiedModel(visionModel);
  const providerName = qualified ? canonicalProviderName(qualified.provider) : embedding.provider;
  const model = qualified ? qualified.model : visionModel.trim();

  if (!isVisionProvider(providerName)) {
    throw new ConfigError(
      `Provider '${providerName}' of client '${clientName}' cannot describe images. ` +
        `Vision providers: ${visionProviders.join(', ')}`,
      'UNKNOWN_PROVIDER',
      clientName
    );
  }
  if (!model) {
    throw new ConfigError(
      `Client '${clientName}': vision model name is empty`,
      'MALFORMED_INPUT',
      clientName
    );
  }

  if (providerName === embedding.provider) {
    const vision: VisionDescriptor = { provider: providerName, model };
    if (embedding.credential) vision.credential = embedding.credential;
    if (embedding.endpoint) vision.endpoint = embedding.endpoint;
    return vision;
  }

  if (providerName === 'openai-compatible') {
    throw new ConfigError(
      `Client '${clientName}': an openai-compatible vision model needs the embedding side ` +
        'to use the same openai-compatible endpoint',
      'MALFORMED_INPUT',
      clientName
    );
  }

  const credential = lookupCredential(providerName, env);
  if (!credential && requiresCredential(providerName)) {
    throw missingCredential(providerName, clientName);
  }

  const vision: VisionDescriptor = { provider: providerName, model };
  if (credential) vision.credential = credential;
  return vision;
}
