/**
 * Core
 *
 * Public API barrel file: context, resolver, registry, operations, errors.
 *
 * @example
 * ```typescript
 * import { EmbeddingContext } from '@/core';
 *
 * const context = new EmbeddingContext();
 * await context.register('docs', 'openai::text-embedding-3-small');
 * const vector = await context.embedOne('docs', 'hello');
 * ```
 */

export { EmbeddingContext, type EmbeddingContextOptions } from './context';
export * from './errors';
export * from './operations';
export { ClientRegistry, type ClientRegistryOptions, summarizeClient } from './registry';
export { type ConfigInput, type ResolveOptions, resolveClientConfig } from './resolver';
export { ConcurrencyController, TaskTimeoutError, withTimeout } from './scheduler';
export type {
  ClientDescriptor,
  ClientSummary,
  EmbeddingProvider,
  MultimodalResult,
  PipelineItemResult,
  PipelineStage,
  ProcessingStats,
  RegisteredClient,
  VisionDescriptor,
  VisionProvider
} from './types';
