/**
 * Vision Client Factory
 *
 * Creates describe-stage clients using Vercel AI SDK v6 with direct provider packages.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { PromptSettings, VisionProvider } from '@/config/schema';
import { DEFAULT_OLLAMA_BASE_URL } from '../embedding/factory';
import { VercelVisionClient } from './client';
import type { VisionClient } from './types';

export interface CreateVisionClientOptions {
  apiKey?: string;
  baseUrl?: string;
}

export function createVisionClient(
  provider: VisionProvider,
  model: string,
  prompts: PromptSettings,
  options: CreateVisionClientOptions = {}
): VisionClient {
  return new VercelVisionClient(getLanguageModel(provider, model, options), prompts);
}

function getLanguageModel(
  provider: VisionProvider,
  model: string,
  options: CreateVisionClientOptions
): LanguageModelV3 {
  switch (provider) {
    case 'openai': {
      const openai = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
      return openai(model);
    }

    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey: options.apiKey, baseURL: options.baseUrl });
      return anthropic(model);
    }

    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
      return google(model);
    }

    case 'ollama': {
      // Ollama serves an OpenAI-compatible /v1/chat/completions
      const ollamaProvider = createOpenAICompatible({
        name: 'ollama',
        baseURL: options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
        apiKey: options.apiKey ?? 'ollama' // Required by SDK but not used by Ollama
      });
      return ollamaProvider.languageModel(model);
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
      return openaiCompatible.languageModel(model);
    }

    default: {
      const _exhaustive: never = provider;
      throw new Error(`Unknown provider: ${String(_exhaustive)}`);
    }
  }
}
