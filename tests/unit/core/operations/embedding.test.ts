import { describe, expect, test } from 'vitest';
import { hashVector, registerMockClient } from '@tests/helpers/mocks';
import { ProviderError, UnsupportedOperationError } from '@/core/errors';
import { embedImage, embedMany, embedOne } from '@/core/operations';
import { EmptyTextError, VercelEmbeddingClient } from '@/providers/embedding/client';

const VISION = { provider: 'openai', model: 'gpt-4o-mini' } as const;
const FAST_TIMEOUT = { maxConcurrency: 4, requestTimeoutMs: 20, streamBatchSize: 10 };

describe('embedOne', () => {
  test('returns the provider vector', async () => {
    const { client } = await registerMockClient('docs');

    await expect(embedOne(client, 'hello')).resolves.toEqual([215, 101, 108, 108]);
  });

  test('wraps provider failures as ProviderError with the client name', async () => {
    const { client } = await registerMockClient('docs', {}, { embedding: { failOn: (t) => t === 'bad' } });

    const pending = embedOne(client, 'bad');

    await expect(pending).rejects.toBeInstanceOf(ProviderError);
    await expect(pending).rejects.toMatchObject({
      type: 'REQUEST',
      stage: 'embed',
      clientName: 'docs',
      message: "embed failed for client 'docs' (REQUEST): embedding rejected: bad"
    });
  });

  test('a request past the timeout is a TIMEOUT ProviderError', async () => {
    const { client } = await registerMockClient(
      'docs',
      { performance: FAST_TIMEOUT },
      { embedding: { delayMs: 500 } }
    );

    await expect(embedOne(client, 'slow')).rejects.toMatchObject({ type: 'TIMEOUT', stage: 'embed' });
  });
});

describe('embedMany', () => {
  test('keeps input order and length in one batched call', async () => {
    const { client, handles } = await registerMockClient('docs');

    const vectors = await embedMany(client, ['a', 'bb', 'ccc']);

    expect(vectors).toEqual([hashVector('a'), hashVector('bb'), hashVector('ccc')]);
    expect(handles.embeddingClients[0]?.batchCalls).toBe(1);
  });

  test('an empty batch makes no request', async () => {
    const { client, handles } = await registerMockClient('docs');

    await expect(embedMany(client, [])).resolves.toEqual([]);
    expect(handles.embeddingClients[0]?.batchCalls).toBe(0);
  });

  test('is all-or-nothing', async () => {
    const { client } = await registerMockClient('docs', {}, { embedding: { failOn: (t) => t === 'bad' } });

    await expect(embedMany(client, ['ok', 'bad', 'ok'])).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('embedImage', () => {
  test('describes the image and embeds the description', async () => {
    const { client, handles } = await registerMockClient('images', { vision: VISION });

    const vector = await embedImage(client, new Uint8Array([5]), 'Caption:');

    expect(vector).toEqual(hashVector('image 5'));
    expect(handles.visionClients[0]?.prompts).toEqual(['Caption:']);
  });

  test('a describe failure is a describe-stage ProviderError', async () => {
    const { client } = await registerMockClient(
      'images',
      { vision: VISION },
      { vision: { failOn: () => true } }
    );

    await expect(embedImage(client, new Uint8Array([1]))).rejects.toMatchObject({
      stage: 'describe',
      message: "describe failed for client 'images' (REQUEST): vision model refused image 1"
    });
  });

  test('without a vision model it is unsupported', async () => {
    const { client } = await registerMockClient('docs');

    await expect(embedImage(client, new Uint8Array([1]))).rejects.toBeInstanceOf(UnsupportedOperationError);
  });
});

describe('VercelEmbeddingClient input checks', () => {
  const embeddingClient = new VercelEmbeddingClient('openai/text-embedding-3-small');

  test('rejects whitespace-only text before any request', async () => {
    await expect(embeddingClient.embed('   ')).rejects.toBeInstanceOf(EmptyTextError);
  });

  test('names the index of an empty text in a batch', async () => {
    await expect(embeddingClient.embedBatch(['fine', ''])).rejects.toThrow(
      'Cannot embed empty or whitespace-only text at index 1'
    );
  });

  test('an empty batch resolves without a request', async () => {
    await expect(embeddingClient.embedBatch([])).resolves.toEqual([]);
  });
});
