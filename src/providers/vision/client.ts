/**
 * Vercel AI SDK v6 Vision Client
 *
 * Describes an image with generateText so the description can be embedded.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { PromptSettings } from '@/config/schema';
import { detectImageMediaType } from './media';
import type { DescribeOptions, VisionClient } from './types';

export class EmptyDescriptionError extends Error {
  constructor() {
    super('No description generated by vision model');
    this.name = 'EmptyDescriptionError';
  }
}

export class VercelVisionClient implements VisionClient {
  readonly modelId: string;

  constructor(
    private model: LanguageModelV3,
    private prompts: PromptSettings
  ) {
    this.modelId = model.modelId;
  }

  async describe(image: Uint8Array, options: DescribeOptions = {}): Promise<string> {
    const custom = options.prompt?.trim();

    const { text } = await generateText({
      model: this.model,
      system: custom ? undefined : this.prompts.system,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: custom ?? this.prompts.describe },
            { type: 'image', image, mediaType: detectImageMediaType(image) }
          ]
        }
      ],
      abortSignal: options.abortSignal
    });

    const description = text.trim();
    if (!description) {
      throw new EmptyDescriptionError();
    }
    return description;
  }
}
