/**
 * Multimodal Pipeline
 *
 * Describe-then-embed for a batch of images. Each item is one task through
 * the client's ConcurrencyController; items fail independently and the
 * results come back in input order whatever the completion order.
 */

import { toProviderError } from '@/providers/errors';
import { logBatchProgress, logBatchResult, logBatchStart, logItemFailure } from '@/utils/logger';
import { type ProviderStage, UnsupportedOperationError } from '../errors';
import { TaskTimeoutError } from '../scheduler';
import type { MultimodalResult, PipelineItemResult, RegisteredClient } from '../types';
import { computeStats, EMPTY_STATS } from './stats';

export interface MultimodalOptions {
  /** Describe prompt for every item of this batch */
  prompt?: string;
}

export async function processMultimodal(
  client: RegisteredClient,
  items: readonly Uint8Array[],
  options: MultimodalOptions = {}
): Promise<MultimodalResult> {
  const { vision, embedding } = client.handle;
  if (!vision) {
    throw new UnsupportedOperationError(client.name, 'processMultimodal', 'no vision model configured');
  }

  if (items.length === 0) {
    return { results: [], stats: { ...EMPTY_STATS } };
  }

  const { requestTimeoutMs, streamBatchSize } = client.descriptor.performance;
  const total = items.length;
  const results = new Array<PipelineItemResult>(total);
  let completed = 0;

  logBatchStart(client.name, total, client.concurrency.limit);
  const startedAt = performance.now();

  const runItem = async (image: Uint8Array, index: number): Promise<void> => {
    const progress: { stage: ProviderStage } = { stage: 'describe' };

    try {
      const vector = await client.concurrency.run(async (abortSignal) => {
        const description = await vision.describe(image, { prompt: options.prompt, abortSignal });
        progress.stage = 'embed';
        return embedding.embed(description, { abortSignal });
      }, requestTimeoutMs);
      results[index] = { status: 'success', embedding: vector };
    } catch (error) {
      const failure: PipelineItemResult =
        error instanceof TaskTimeoutError
          ? { status: 'failure', stage: 'timeout', error: error.message }
          : {
              status: 'failure',
              stage: progress.stage,
              error: toProviderError(error, client.name, progress.stage).message
            };
      results[index] = failure;
      logItemFailure(index, failure.stage, failure.error);
    }

    completed++;
    if (completed % streamBatchSize === 0 && completed < total) {
      logBatchProgress(completed, total);
    }
  };

  await Promise.all(items.map(runItem));

  const stats = computeStats(results, performance.now() - startedAt);
  logBatchResult(stats);
  return { results, stats };
}
