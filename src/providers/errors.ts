/**
 * Provider Error Classification
 *
 * Maps failures raised by the AI SDK (and by the clients around it) onto
 * ProviderErrorType, then wraps them with the client and stage they came from.
 */

import { APICallError, RetryError } from 'ai';
import {
  errorMessage,
  ProviderError,
  type ProviderErrorType,
  type ProviderStage
} from '@/core/errors';
import { TaskTimeoutError } from '@/core/scheduler';
import { EmptyTextError } from './embedding/client';
import { EmptyDescriptionError } from './vision/client';

/**
 * Categories:
 * - AUTHENTICATION: 401/403
 * - QUOTA: 429
 * - TRANSPORT: no response, 5xx, refused or reset connections
 * - TIMEOUT: aborted by the request timeout
 * - INVALID_RESPONSE: provider answered without usable content
 * - REQUEST: everything else, including rejected input
 */
export function classifyProviderError(error: unknown): ProviderErrorType {
  // The SDK wraps exhausted retries; the last attempt carries the cause
  if (RetryError.isInstance(error)) {
    return classifyProviderError(error.lastError);
  }

  if (error instanceof TaskTimeoutError) return 'TIMEOUT';
  if (error instanceof EmptyTextError) return 'REQUEST';
  if (error instanceof EmptyDescriptionError) return 'INVALID_RESPONSE';

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 401 || status === 403) return 'AUTHENTICATION';
    if (status === 429) return 'QUOTA';
    if (status === undefined || status >= 500) return 'TRANSPORT';
    return 'REQUEST';
  }

  if (!(error instanceof Error)) return 'REQUEST';

  if (error.name === 'AbortError' || error.name === 'TimeoutError') return 'TIMEOUT';

  const message = error.message.toLowerCase();
  if (
    message.includes('fetch failed') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('network')
  ) {
    return 'TRANSPORT';
  }
  if (message.includes('no embedding') || message.includes('no description')) {
    return 'INVALID_RESPONSE';
  }

  return 'REQUEST';
}

/**
 * Wrap any failure of a provider call as a ProviderError.
 * An error that already is one passes through unchanged.
 */
export function toProviderError(
  error: unknown,
  clientName: string,
  stage: ProviderStage
): ProviderError {
  if (error instanceof ProviderError) return error;

  const type = classifyProviderError(error);
  const cause = error instanceof Error ? error : undefined;
  return new ProviderError(
    `${stage} failed for client '${clientName}' (${type}): ${errorMessage(error)}`,
    type,
    clientName,
    stage,
    cause
  );
}
