/**
 * Embedding Client Factory
 *
 * Creates embedding clients using Vercel AI SDK v6 with direct provider packages.
 * All requests go directly to provider APIs.
 */

import { createCohere } from '@ai-sdk/cohere';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createMistral } from '@ai-sdk/mistral';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { EmbeddingModelV3 } from '@ai-sdk/provider';
import { defaultEmbeddingSettingsMiddleware, wrapEmbeddingModel } from 'ai';
import type { EmbeddingProvider } from '@/config/schema';
import { VercelEmbeddingClient } from './client';
import type { EmbeddingClient } from './types';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface CreateEmbeddingClientOptions {
  apiKey?: string;
  baseUrl?: string;
  dimensions?: number;
  normalize?: boolean;
}

export function createEmbeddingClient(
  provider: EmbeddingProvider,
  model: string,
  options: CreateEmbeddingClientOptions = {}
): EmbeddingClient {
  const embeddingModel = getEmbeddingModel(provider, model, options);
  return new VercelEmbeddingClient(embeddingModel, {
    dimensions: options.dimensions,
    normalize: options.normalize
  });
}

function getEmbeddingModel(
  provider: EmbeddingProvider,
  model: string,
  options: CreateEmbeddingClientOptions
): EmbeddingModelV3 {
  const { dimensions } = options;

  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
      const embedding = openai.embedding(model);
      // OpenAI supports dimensions via providerOptions
      return dimensions === undefined
        ? embedding
        : wrapWithProviderOptions(embedding, 'openai', { dimensions });
    }

    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
      const embedding = google.embedding(model);
      // Google uses outputDimensionality via providerOptions
      return dimensions === undefined
        ? embedding
        : wrapWithProviderOptions(embedding, 'google', { outputDimensionality: dimensions });
    }

    case 'cohere': {
      const cohere = createCohere({ apiKey: options.apiKey, baseURL: options.baseUrl });
      // Cohere doesn't support dimension reduction
      return cohere.embedding(model);
    }

    case 'mistral': {
      const mistral = createMistral({ apiKey: options.apiKey, baseURL: options.baseUrl });
      // Mistral doesn't support dimension reduction
      return mistral.embedding(model);
    }

    case 'ollama': {
      // Ollama serves an OpenAI-compatible /v1/embeddings
      const ollamaProvider = createOpenAICompatible({
        name: 'ollama',
        baseURL: options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: options.apiKey ?? 'ollama' // Required by SDK but not used by Ollama
      });
      return ollamaProvider.embeddingModel(model);
    }

    case 'openai-compatible': {
      if (!options.baseUrl) {
        throw new Error('baseUrl required for openai-compatible provider');
      }
      const openaiCompatible = createOpenAICompatible({
        name: 'openai-compatible',
        baseURL: options.baseUrl,
        apiKey: options.apiKey ?? ''
      });
      // Not wrapped with dimensions: not all endpoints accept them
      return openaiCompatible.embeddingModel(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Wrap an embedding model with default provider options (e.g., dimensions).
 * The options are set once at model creation, not on every embed call.
 */
function wrapWithProviderOptions(
  model: EmbeddingModelV3,
  providerKey: string,
  providerOptions: Record<string, number>
): EmbeddingModelV3 {
  return wrapEmbeddingModel({
    model,
    middleware: defaultEmbeddingSettingsMiddleware({
      settings: {
        providerOptions: {
          [providerKey]: providerOptions
        }
      }
    })
  });
}
