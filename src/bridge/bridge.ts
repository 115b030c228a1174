/**
 * Execution Bridge
 *
 * Runs async work on one worker thread and blocks the calling thread until
 * the answer arrives (synckit: Atomics.wait on a shared buffer). The worker
 * starts on the first call and lives until the process exits.
 *
 * Anything that goes wrong in transit becomes a BridgeError: the worker
 * failing to start, the task throwing, the optional timeout, or an answer
 * the decoder rejects.
 */

import { createSyncFn, type TsRunner } from 'synckit';
import { BridgeError, errorMessage } from '@/core/errors';

type WorkerCall = (request: unknown) => Promise<unknown>;

export interface ExecutionBridgeOptions {
  /** Upper bound on one blocking call; unbounded when omitted */
  timeoutMs?: number;
  /** Loader for TypeScript worker files */
  tsRunner?: TsRunner;
}

export class ExecutionBridge<TRequest, TResponse> {
  private call: ((request: unknown) => unknown) | null = null;

  constructor(
    private readonly workerPath: string,
    private readonly decode: (value: unknown) => TResponse,
    private readonly options: ExecutionBridgeOptions = {}
  ) {}

  get started(): boolean {
    return this.call !== null;
  }

  runBlocking(request: TRequest): TResponse {
    let raw: unknown;
    try {
      raw = this.start()(request);
    } catch (error) {
      throw new BridgeError(
        `Worker task failed: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    try {
      return this.decode(raw);
    } catch (error) {
      throw new BridgeError(
        `Unexpected response from worker: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private start(): (request: unknown) => unknown {
    if (!this.call) {
      this.call = createSyncFn<WorkerCall>(this.workerPath, {
        timeout: this.options.timeoutMs,
        tsRunner: this.options.tsRunner
      });
    }
    return this.call;
  }
}
