/**
 * Provider Handle
 *
 * The live provider clients behind one registered client. Built eagerly at
 * registration so construction problems surface there, not on first use.
 */

import type { PromptSettings } from '@/config/schema';
import type { ClientDescriptor } from '@/core/types';
import { createEmbeddingClient } from './embedding/factory';
import type { EmbeddingClient } from './embedding/types';
import { createVisionClient } from './vision/factory';
import type { VisionClient } from './vision/types';

export interface ProviderHandle {
  readonly embedding: EmbeddingClient;
  /** Present only when the descriptor names a vision model */
  readonly vision?: VisionClient;
}

/** Builds the handle for a descriptor. Tests substitute fakes here. */
export type HandleFactory = (
  descriptor: ClientDescriptor,
  prompts: PromptSettings
) => ProviderHandle | Promise<ProviderHandle>;

export const createProviderHandle: HandleFactory = (descriptor, prompts) => {
  const embedding = createEmbeddingClient(descriptor.provider, descriptor.model, {
    apiKey: descriptor.credential,
    baseUrl: descriptor.endpoint,
    dimensions: descriptor.dimensions,
    normalize: descriptor.normalize
  });

  if (!descriptor.vision) {
    return { embedding };
  }

  const { vision } = descriptor;
  return {
    embedding,
    vision: createVisionClient(vision.provider, vision.model, prompts, {
      apiKey: vision.credential,
      baseUrl: vision.endpoint
    })
  };
};
