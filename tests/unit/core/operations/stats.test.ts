import { describe, expect, test } from 'vitest';
import { computeStats, serializeMultimodalResult } from '@/core/operations';
import type { PipelineItemResult } from '@/core/types';

const RESULTS: PipelineItemResult[] = [
  { status: 'success', embedding: [1] },
  { status: 'failure', stage: 'timeout', error: 'Request timed out after 50ms' },
  { status: 'success', embedding: [0.5, -1] },
  { status: 'failure', stage: 'describe', error: 'refused' }
];

describe('computeStats', () => {
  test('counts outcomes and derives rates from the batch duration', () => {
    expect(computeStats(RESULTS, 2000)).toEqual({
      totalProcessed: 4,
      successful: 2,
      failed: 2,
      totalDurationMs: 2000,
      avgDurationPerItemMs: 500,
      throughput: 2
    });
  });

  test('zero duration gives zero throughput', () => {
    expect(computeStats(RESULTS, 0).throughput).toBe(0);
  });

  test('no results gives zero averages', () => {
    const stats = computeStats([], 10);

    expect(stats.avgDurationPerItemMs).toBe(0);
    expect(stats.throughput).toBe(0);
  });
});

describe('serializeMultimodalResult', () => {
  test('encodes vectors as float32 blobs and keeps failure stages', () => {
    const stats = computeStats(RESULTS, 1000);

    expect(serializeMultimodalResult({ results: RESULTS, stats })).toEqual({
      results: [
        { embedding: 'AACAPw==' },
        { error: 'Request timed out after 50ms', stage: 'timeout' },
        // 0.5f = 0x3F000000, -1f = 0xBF800000
        { embedding: 'AAAAPwAAgL8=' },
        { error: 'refused', stage: 'describe' }
      ],
      stats
    });
  });
});
