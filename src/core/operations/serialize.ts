/**
 * Host result format for multimodal batches.
 * Vectors become base64 float32 blobs; failures keep their stage.
 */

import { encodeVector } from '@/providers/embedding/utils';
import type { MultimodalResult, PipelineStage, ProcessingStats } from '../types';

export type SerializedItemResult = { embedding: string } | { error: string; stage: PipelineStage };

export interface SerializedMultimodalResult {
  results: SerializedItemResult[];
  stats: ProcessingStats;
}

export function serializeMultimodalResult(result: MultimodalResult): SerializedMultimodalResult {
  return {
    results: result.results.map((item) =>
      item.status === 'success'
        ? { embedding: encodeVector(item.embedding) }
        : { error: item.error, stage: item.stage }
    ),
    stats: { ...result.stats }
  };
}
