/**
 * Multimodal Pipeline Tests
 *
 * Bounded fan-out, per-item fault isolation, timeouts and stats.
 */

import { describe, expect, test } from 'vitest';
import { indexedImages } from '@tests/helpers/fixtures';
import { hashVector, registerMockClient } from '@tests/helpers/mocks';
import { UnsupportedOperationError } from '@/core/errors';
import { processMultimodal } from '@/core/operations';

const VISION = { provider: 'openai', model: 'gpt-4o-mini' } as const;

function performance(maxConcurrency: number, requestTimeoutMs = 5000) {
  return { maxConcurrency, requestTimeoutMs, streamBatchSize: 10 };
}

describe('processMultimodal', () => {
  test('bounds concurrency: four 100ms items at concurrency 2 take about 200ms', async () => {
    const { client } = await registerMockClient(
      'images',
      { vision: VISION, performance: performance(2), dedicatedBudget: true },
      { vision: { delayMs: 100 } }
    );

    const { results, stats } = await processMultimodal(client, indexedImages(4));

    expect(results.every((result) => result.status === 'success')).toBe(true);
    expect(client.concurrency.peakInFlight).toBe(2);
    expect(stats.totalDurationMs).toBeGreaterThanOrEqual(190);
    expect(stats.totalDurationMs).toBeLessThan(390);
  });

  test('a describe failure affects only its own slot', async () => {
    const { client } = await registerMockClient(
      'images',
      { vision: VISION },
      { vision: { failOn: (image) => image[0] === 2 } }
    );

    const { results, stats } = await processMultimodal(client, indexedImages(5));

    expect(results).toEqual([
      { status: 'success', embedding: hashVector('image 0') },
      { status: 'success', embedding: hashVector('image 1') },
      {
        status: 'failure',
        stage: 'describe',
        error: "describe failed for client 'images' (REQUEST): vision model refused image 2"
      },
      { status: 'success', embedding: hashVector('image 3') },
      { status: 'success', embedding: hashVector('image 4') }
    ]);
    expect(stats.totalProcessed).toBe(5);
    expect(stats.successful).toBe(4);
    expect(stats.failed).toBe(1);
  });

  test('a describe failure skips the embed stage for that item', async () => {
    const { client, handles } = await registerMockClient(
      'images',
      { vision: VISION },
      { vision: { failOn: (image) => image[0] === 0 } }
    );

    await processMultimodal(client, indexedImages(2));

    expect(handles.embeddingClients[0]?.embedded).toEqual(['image 1']);
  });

  test('an embed failure is tagged with the embed stage', async () => {
    const { client } = await registerMockClient(
      'images',
      { vision: VISION },
      { embedding: { failOn: (text) => text === 'image 1' } }
    );

    const { results } = await processMultimodal(client, indexedImages(3));

    expect(results[1]).toEqual({
      status: 'failure',
      stage: 'embed',
      error: "embed failed for client 'images' (REQUEST): embedding rejected: image 1"
    });
    expect(results[0]?.status).toBe('success');
    expect(results[2]?.status).toBe('success');
  });

  test('an item past the timeout fails alone and frees its slot', async () => {
    const { client } = await registerMockClient(
      'images',
      { vision: VISION, performance: performance(1, 50), dedicatedBudget: true },
      { vision: { delayMs: (image) => (image[0] === 1 ? 1000 : 0) } }
    );

    const { results, stats } = await processMultimodal(client, indexedImages(3));

    expect(results).toEqual([
      { status: 'success', embedding: hashVector('image 0') },
      { status: 'failure', stage: 'timeout', error: 'Request timed out after 50ms' },
      { status: 'success', embedding: hashVector('image 2') }
    ]);
    expect(stats.failed).toBe(1);
    expect(stats.totalDurationMs).toBeLessThan(1000);
  });

  test('results follow input order, not completion order', async () => {
    const { client } = await registerMockClient(
      'images',
      { vision: VISION },
      { vision: { delayMs: (image) => (4 - (image[0] ?? 0)) * 15 } }
    );

    const { results } = await processMultimodal(client, indexedImages(4));

    expect(results).toEqual(
      [0, 1, 2, 3].map((i) => ({ status: 'success', embedding: hashVector(`image ${i}`) }))
    );
  });

  test('a batch prompt reaches every describe call', async () => {
    const { client, handles } = await registerMockClient('images', { vision: VISION });

    await processMultimodal(client, indexedImages(3), { prompt: 'Caption:' });

    expect(handles.visionClients[0]?.prompts).toEqual(['Caption:', 'Caption:', 'Caption:']);
  });

  test('an empty batch returns zeroed stats', async () => {
    const { client } = await registerMockClient('images', { vision: VISION });

    await expect(processMultimodal(client, [])).resolves.toEqual({
      results: [],
      stats: {
        totalProcessed: 0,
        successful: 0,
        failed: 0,
        totalDurationMs: 0,
        avgDurationPerItemMs: 0,
        throughput: 0
      }
    });
  });

  test('without a vision model nothing is scheduled', async () => {
    const { client, handles } = await registerMockClient('docs');

    await expect(processMultimodal(client, indexedImages(3))).rejects.toBeInstanceOf(
      UnsupportedOperationError
    );
    expect(handles.embeddingClients[0]?.embedded).toEqual([]);
    expect(client.concurrency.peakInFlight).toBe(0);
  });
});
