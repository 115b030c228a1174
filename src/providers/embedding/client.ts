/**
 * Vercel AI SDK v6 Embedding Client
 *
 * Wraps the AI SDK embed/embedMany functions with optional L2 normalization.
 */

import type { EmbeddingModel } from 'ai';
import { embed, embedMany } from 'ai';
import type { EmbedCallOptions, EmbeddingClient } from './types';
import { normalizeL2 } from './utils';

export class EmptyTextError extends Error {
  constructor(index?: number) {
    super(
      index === undefined
        ? 'Cannot embed empty or whitespace-only text'
        : `Cannot embed empty or whitespace-only text at index ${index}`
    );
    this.name = 'EmptyTextError';
  }
}

export interface VercelEmbeddingClientOptions {
  dimensions?: number;
  normalize?: boolean;
}

export class VercelEmbeddingClient implements EmbeddingClient {
  readonly modelId: string;
  readonly dimensions?: number;
  private readonly normalize: boolean;

  constructor(
    private model: EmbeddingModel,
    options: VercelEmbeddingClientOptions = {}
  ) {
    // Extract modelId from the model (handles string, V2, and V3 models)
    this.modelId = typeof model === 'string' ? model : model.modelId;
    this.dimensions = options.dimensions;
    this.normalize = options.normalize ?? false;
  }

  async embed(text: string, options: EmbedCallOptions = {}): Promise<number[]> {
    if (!text.trim()) {
      throw new EmptyTextError();
    }

    const { embedding } = await embed({
      model: this.model,
      value: text,
      abortSignal: options.abortSignal
    });

    return this.finish(embedding);
  }

  async embedBatch(texts: string[], options: EmbedCallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    texts.forEach((text, i) => {
      if (!text.trim()) throw new EmptyTextError(i);
    });

    const { embeddings } = await embedMany({
      model: this.model,
      values: texts,
      abortSignal: options.abortSignal
    });

    return embeddings.map((embedding) => this.finish(embedding));
  }

  private finish(embedding: number[]): number[] {
    return this.normalize ? normalizeL2(embedding) : embedding;
  }
}
