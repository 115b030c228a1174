import type { PipelineItemResult, ProcessingStats } from '../types';

export const EMPTY_STATS: Readonly<ProcessingStats> = {
  totalProcessed: 0,
  successful: 0,
  failed: 0,
  totalDurationMs: 0,
  avgDurationPerItemMs: 0,
  throughput: 0
};

/**
 * Stats from outcome tags and the wall-clock duration of the whole batch.
 */
export function computeStats(results: readonly PipelineItemResult[], durationMs: number): ProcessingStats {
  const totalProcessed = results.length;
  const successful = results.filter((result) => result.status === 'success').length;

  return {
    totalProcessed,
    successful,
    failed: totalProcessed - successful,
    totalDurationMs: durationMs,
    avgDurationPerItemMs: totalProcessed > 0 ? durationMs / totalProcessed : 0,
    throughput: durationMs > 0 ? (totalProcessed * 1000) / durationMs : 0
  };
}
