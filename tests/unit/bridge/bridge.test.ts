/**
 * Execution Bridge Tests
 *
 * Run against small synckit worker fixtures; each fixture file maps to one
 * worker thread for the whole test run.
 */

import { fileURLToPath } from 'node:url';
import { threadId } from 'node:worker_threads';
import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { ExecutionBridge } from '@/bridge/bridge';
import { BridgeError } from '@/core/errors';

interface EchoRequest {
  value: string;
  delayMs?: number;
  fail?: string;
}

const echoResponse = z.object({ echo: z.string(), threadId: z.number() });
type EchoResponse = z.infer<typeof echoResponse>;

function fixture(name: string): string {
  return fileURLToPath(new URL(`../../fixtures/workers/${name}`, import.meta.url));
}

function echoBridge(): ExecutionBridge<EchoRequest, EchoResponse> {
  return new ExecutionBridge(fixture('echo.mjs'), (value) => echoResponse.parse(value));
}

describe('ExecutionBridge', () => {
  test('starts the worker on the first call', () => {
    const bridge = echoBridge();
    expect(bridge.started).toBe(false);

    expect(bridge.runBlocking({ value: 'hello' }).echo).toBe('hello');
    expect(bridge.started).toBe(true);
  });

  test('blocks until async work in the worker finishes', () => {
    const bridge = echoBridge();
    const startedAt = Date.now();

    const response = bridge.runBlocking({ value: 'later', delayMs: 50 });

    expect(response.echo).toBe('later');
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(45);
  });

  test('every call runs on the same worker thread, not the caller', () => {
    const bridge = echoBridge();

    const first = bridge.runBlocking({ value: 'a' });
    const second = bridge.runBlocking({ value: 'b' });

    expect(first.threadId).toBe(second.threadId);
    expect(first.threadId).not.toBe(threadId);
  });

  test('a throw inside the worker becomes a BridgeError', () => {
    const bridge = echoBridge();

    expect(() => bridge.runBlocking({ value: 'x', fail: 'boom' })).toThrow(BridgeError);
    expect(() => bridge.runBlocking({ value: 'x', fail: 'boom' })).toThrow(/worker failed: boom/);
  });

  test('the bridge keeps working after a failed task', () => {
    const bridge = echoBridge();

    expect(() => bridge.runBlocking({ value: 'x', fail: 'once' })).toThrow(BridgeError);
    expect(bridge.runBlocking({ value: 'again' }).echo).toBe('again');
  });

  test('an answer the decoder rejects becomes a BridgeError', () => {
    const strict = z.object({ other: z.string() });
    const bridge = new ExecutionBridge<EchoRequest, z.infer<typeof strict>>(fixture('echo.mjs'), (value) =>
      strict.parse(value)
    );

    expect(() => bridge.runBlocking({ value: 'x' })).toThrow(/^Unexpected response from worker/);
  });

  test('exceeding the bridge timeout becomes a BridgeError', () => {
    const bridge = new ExecutionBridge<EchoRequest, EchoResponse>(
      fixture('slow.mjs'),
      (value) => echoResponse.parse(value),
      { timeoutMs: 50 }
    );

    expect(() => bridge.runBlocking({ value: 'x' })).toThrow(BridgeError);
  });
});
