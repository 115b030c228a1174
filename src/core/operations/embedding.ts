/**
 * Text and single-image embedding operations.
 *
 * All-or-nothing: any failure rejects the whole call with a ProviderError.
 * No retries here; the AI SDK applies its own retry policy per request.
 */

import { toProviderError } from '@/providers/errors';
import { UnsupportedOperationError } from '../errors';
import { withTimeout } from '../scheduler';
import type { RegisteredClient } from '../types';

export async function embedOne(client: RegisteredClient, text: string): Promise<number[]> {
  const { requestTimeoutMs } = client.descriptor.performance;
  try {
    return await withTimeout(
      (abortSignal) => client.handle.embedding.embed(text, { abortSignal }),
      requestTimeoutMs
    );
  } catch (error) {
    throw toProviderError(error, client.name, 'embed');
  }
}

/**
 * One batched request for all texts; the SDK splits it when the provider
 * caps batch size. Output order and length match the input.
 */
export async function embedMany(client: RegisteredClient, texts: readonly string[]): Promise<number[][]> {
  if (texts.length === 0) return [];

  try {
    return await client.handle.embedding.embedBatch([...texts]);
  } catch (error) {
    throw toProviderError(error, client.name, 'embed');
  }
}

/**
 * Describe one image, then embed the description.
 */
export async function embedImage(
  client: RegisteredClient,
  image: Uint8Array,
  prompt?: string
): Promise<number[]> {
  const { vision, embedding } = client.handle;
  if (!vision) {
    throw new UnsupportedOperationError(client.name, 'embedImage', 'no vision model configured');
  }

  const { requestTimeoutMs } = client.descriptor.performance;

  let description: string;
  try {
    description = await withTimeout(
      (abortSignal) => vision.describe(image, { prompt, abortSignal }),
      requestTimeoutMs
    );
  } catch (error) {
    throw toProviderError(error, client.name, 'describe');
  }

  try {
    return await withTimeout(
      (abortSignal) => embedding.embed(description, { abortSignal }),
      requestTimeoutMs
    );
  } catch (error) {
    throw toProviderError(error, client.name, 'embed');
  }
}
