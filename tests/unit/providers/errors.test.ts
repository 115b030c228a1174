/**
 * Provider Error Classification Tests
 */

import { APICallError, RetryError } from 'ai';
import { describe, expect, test } from 'vitest';
import { ProviderError } from '@/core/errors';
import { TaskTimeoutError } from '@/core/scheduler';
import { EmptyTextError } from '@/providers/embedding/client';
import { classifyProviderError, toProviderError } from '@/providers/errors';
import { EmptyDescriptionError } from '@/providers/vision/client';

function apiError(statusCode: number | undefined, message = 'provider said no'): APICallError {
  return new APICallError({
    message,
    url: 'https://api.example.test/v1/embeddings',
    requestBodyValues: {},
    statusCode
  });
}

describe('classifyProviderError', () => {
  describe('HTTP status codes', () => {
    test('401 and 403 are authentication failures', () => {
      expect(classifyProviderError(apiError(401))).toBe('AUTHENTICATION');
      expect(classifyProviderError(apiError(403))).toBe('AUTHENTICATION');
    });

    test('429 is a quota failure', () => {
      expect(classifyProviderError(apiError(429))).toBe('QUOTA');
    });

    test('5xx and missing status are transport failures', () => {
      expect(classifyProviderError(apiError(502))).toBe('TRANSPORT');
      expect(classifyProviderError(apiError(undefined))).toBe('TRANSPORT');
    });

    test('other 4xx are request failures', () => {
      expect(classifyProviderError(apiError(400))).toBe('REQUEST');
      expect(classifyProviderError(apiError(404))).toBe('REQUEST');
    });
  });

  test('exhausted retries are classified by the last attempt', () => {
    const error = new RetryError({
      message: 'Failed after 3 attempts',
      reason: 'maxRetriesExceeded',
      errors: [apiError(500), apiError(500), apiError(429)]
    });
    expect(classifyProviderError(error)).toBe('QUOTA');
  });

  test('timeouts and aborts', () => {
    expect(classifyProviderError(new TaskTimeoutError(100))).toBe('TIMEOUT');

    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(classifyProviderError(abort)).toBe('TIMEOUT');
  });

  test('network failures without a response are transport failures', () => {
    expect(classifyProviderError(new Error('fetch failed'))).toBe('TRANSPORT');
    expect(classifyProviderError(new Error('connect ECONNREFUSED 127.0.0.1:11434'))).toBe('TRANSPORT');
  });

  test('empty input and empty output', () => {
    expect(classifyProviderError(new EmptyTextError())).toBe('REQUEST');
    expect(classifyProviderError(new EmptyDescriptionError())).toBe('INVALID_RESPONSE');
  });

  test('anything unrecognised is a request failure', () => {
    expect(classifyProviderError(new Error('model not found'))).toBe('REQUEST');
    expect(classifyProviderError('a thrown string')).toBe('REQUEST');
  });
});

describe('toProviderError', () => {
  test('wraps with client, stage, type and cause', () => {
    const cause = apiError(429, 'Too many requests');
    const error = toProviderError(cause, 'docs', 'embed');

    expect(error).toBeInstanceOf(ProviderError);
    expect(error.message).toBe("embed failed for client 'docs' (QUOTA): Too many requests");
    expect(error.type).toBe('QUOTA');
    expect(error.clientName).toBe('docs');
    expect(error.stage).toBe('embed');
    expect(error.cause).toBe(cause);
    expect(error.transient).toBe(true);
  });

  test('authentication failures are not transient', () => {
    expect(toProviderError(apiError(401), 'docs', 'describe').transient).toBe(false);
  });

  test('passes an existing ProviderError through unchanged', () => {
    const original = new ProviderError('already wrapped', 'TRANSPORT', 'docs', 'describe');
    expect(toProviderError(original, 'other', 'embed')).toBe(original);
  });
});
