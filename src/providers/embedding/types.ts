import type { EmbeddingProvider } from '@/config/schema';

export type { EmbeddingProvider };

export interface EmbedCallOptions {
  /** Aborts the in-flight provider request */
  abortSignal?: AbortSignal;
}

export interface EmbeddingClient {
  /**
   * Generate the embedding of a single text.
   * Rejects empty or whitespace-only text before any request is made.
   */
  embed(text: string, options?: EmbedCallOptions): Promise<number[]>;

  /**
   * Generate embeddings for several texts through one batched call.
   * Output order and length match the input.
   */
  embedBatch(texts: string[], options?: EmbedCallOptions): Promise<number[][]>;

  /** Requested output dimensionality, when the client was configured with one */
  readonly dimensions?: number;

  readonly modelId: string;
}
