import type { VisionProvider } from '@/config/schema';

export type { VisionProvider };

export interface DescribeOptions {
  /** Replaces the configured describe prompt; the system prompt is then omitted */
  prompt?: string;
  abortSignal?: AbortSignal;
}

/**
 * Turns an image into a text description for the embed stage.
 */
export interface VisionClient {
  describe(image: Uint8Array, options?: DescribeOptions): Promise<string>;

  readonly modelId: string;
}

export type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';
