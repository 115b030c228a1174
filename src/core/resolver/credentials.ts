/**
 * Environment credential fallback, keyed by provider.
 * Consulted only when the configuration itself carries no credential.
 */

import type { KnownProvider } from '@/config/schema';

const CREDENTIAL_ENV_VARS: Readonly<Record<KnownProvider, readonly string[]>> = {
  openai: ['OPENAI_API_KEY'],
  google: ['GOOGLE_GENERATIVE_AI_API_KEY', 'GEMINI_API_KEY'],
  cohere: ['COHERE_API_KEY', 'CO_API_KEY'],
  mistral: ['MISTRAL_API_KEY'],
  anthropic: ['ANTHROPIC_API_KEY'],
  ollama: ['OLLAMA_API_KEY'],
  'openai-compatible': ['OPENAI_COMPATIBLE_API_KEY']
};

// Local and self-hosted endpoints work without a key
const CREDENTIAL_OPTIONAL: ReadonlySet<KnownProvider> = new Set(['ollama', 'openai-compatible']);

export function credentialEnvVars(provider: KnownProvider): readonly string[] {
  return CREDENTIAL_ENV_VARS[provider];
}

export function requiresCredential(provider: KnownProvider): boolean {
  return !CREDENTIAL_OPTIONAL.has(provider);
}

export function lookupCredential(
  provider: KnownProvider,
  env: NodeJS.ProcessEnv
): string | undefined {
  for (const name of CREDENTIAL_ENV_VARS[provider]) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}
