import { z } from 'zod';

// Provider types
export const embeddingProviders = [
  'openai',
  'google',
  'cohere',
  'mistral',
  'ollama',
  'openai-compatible'
] as const;
export type EmbeddingProvider = (typeof embeddingProviders)[number];

export const visionProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type VisionProvider = (typeof visionProviders)[number];

export type KnownProvider = EmbeddingProvider | VisionProvider;

/** Alternative spellings accepted in configuration strings. */
export const providerAliases: Readonly<Record<string, KnownProvider>> = {
  gemini: 'google',
  openai_compatible: 'openai-compatible'
};

// Performance
export const DEFAULT_PERFORMANCE = {
  maxConcurrency: 4,
  requestTimeoutMs: 30_000,
  streamBatchSize: 10
} as const;

export const performanceSchema = z.object({
  maxConcurrency: z.number().int().min(1),
  requestTimeoutMs: z.number().int().positive(),
  streamBatchSize: z.number().int().min(1)
});
export type PerformanceConfig = z.infer<typeof performanceSchema>;

// Describe-stage prompts
export const DEFAULT_PROMPTS = {
  system:
    'You are a helpful vision AI. Describe images accurately and concisely for embedding ' +
    'purposes. Focus on key visual elements, objects, scene context, colors, and composition.',
  describe: 'Describe this image in detail for search and embedding purposes:'
} as const;

export interface PromptSettings {
  system: string;
  describe: string;
}

// Settings file schema
export const settingsSchema = z
  .object({
    $schema: z.string().optional(),
    performance: performanceSchema.partial().optional(),
    logging: z
      .object({
        enabled: z.boolean().default(false)
      })
      .optional(),
    prompts: z
      .object({
        system: z.string().min(1).optional(),
        describe: z.string().min(1).optional()
      })
      .optional()
  })
  .strict()
  .transform((data) => {
    const performance: PerformanceConfig = {
      maxConcurrency: data.performance?.maxConcurrency ?? DEFAULT_PERFORMANCE.maxConcurrency,
      requestTimeoutMs: data.performance?.requestTimeoutMs ?? DEFAULT_PERFORMANCE.requestTimeoutMs,
      streamBatchSize: data.performance?.streamBatchSize ?? DEFAULT_PERFORMANCE.streamBatchSize
    };
    const prompts: PromptSettings = {
      system: data.prompts?.system ?? DEFAULT_PROMPTS.system,
      describe: data.prompts?.describe ?? DEFAULT_PROMPTS.describe
    };

    return {
      performance,
      logging: { enabled: data.logging?.enabled ?? false },
      prompts
    };
  });

export type Settings = z.infer<typeof settingsSchema>;
