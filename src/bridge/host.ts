/**
 * Host Binding
 *
 * The synchronous surface a host engine calls. Configuration is resolved on
 * the calling thread, so ConfigError is thrown before the worker is involved;
 * every other operation is one blocking round trip through the bridge.
 */

import { fileURLToPath } from 'node:url';
import { getSettings } from '@/config/config';
import type { PerformanceConfig } from '@/config/schema';
import { BridgeError } from '@/core/errors';
import { type ConfigInput, resolveClientConfig } from '@/core/resolver';
import type { ClientSummary, MultimodalResult } from '@/core/types';
import { VERSION } from '@/version';
import { ExecutionBridge } from './bridge';
import {
  type BridgeRequest,
  type BridgeResponse,
  type BridgeSuccess,
  decodeError,
  decodeResponse
} from './protocol';

export interface HostBridge {
  runBlocking(request: BridgeRequest): BridgeResponse;
  readonly started: boolean;
}

export interface HostBindingOptions {
  /** Defaults to the process-wide bridge over worker.ts */
  bridge?: HostBridge;
  /** Environment for credential fallback (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Performance defaults for resolution (default: from the settings file) */
  performance?: PerformanceConfig;
}

let defaultBridge: ExecutionBridge<BridgeRequest, BridgeResponse> | null = null;

export function getExecutionBridge(): ExecutionBridge<BridgeRequest, BridgeResponse> {
  if (!defaultBridge) {
    const workerPath = fileURLToPath(new URL('./worker.ts', import.meta.url));
    defaultBridge = new ExecutionBridge(workerPath, decodeResponse, { tsRunner: 'tsx' });
  }
  return defaultBridge;
}

function unexpected(expected: BridgeRequest['op'], received: string): BridgeError {
  return new BridgeError(`Worker answered '${received}' to a '${expected}' request`);
}

export class HostBinding {
  private readonly bridge: HostBridge;
  private readonly env: NodeJS.ProcessEnv;
  private readonly performance?: PerformanceConfig;

  constructor(options: HostBindingOptions = {}) {
    this.bridge = options.bridge ?? getExecutionBridge();
    this.env = options.env ?? process.env;
    this.performance = options.performance;
  }

  register(name: string, config: ConfigInput): void {
    const descriptor = resolveClientConfig(config, {
      clientName: name,
      env: this.env,
      performance: this.performance ?? getSettings().performance
    });
    const response = this.send({ op: 'register', name, descriptor });
    if (response.op !== 'register') throw unexpected('register', response.op);
  }

  embedOne(name: string, text: string): number[] {
    const response = this.send({ op: 'embedOne', name, text });
    if (response.op !== 'embedOne') throw unexpected('embedOne', response.op);
    return response.value;
  }

  embedMany(name: string, texts: readonly string[]): number[][] {
    const response = this.send({ op: 'embedMany', name, texts: [...texts] });
    if (response.op !== 'embedMany') throw unexpected('embedMany', response.op);
    return response.value;
  }

  embedImage(name: string, image: Uint8Array, prompt?: string): number[] {
    const response = this.send({ op: 'embedImage', name, image, prompt });
    if (response.op !== 'embedImage') throw unexpected('embedImage', response.op);
    return response.value;
  }

  processMultimodal(name: string, items: readonly Uint8Array[], prompt?: string): MultimodalResult {
    const response = this.send({ op: 'processMultimodal', name, items: [...items], prompt });
    if (response.op !== 'processMultimodal') throw unexpected('processMultimodal', response.op);
    return response.value;
  }

  listClients(): ClientSummary[] {
    const response = this.send({ op: 'listClients' });
    if (response.op !== 'listClients') throw unexpected('listClients', response.op);
    return response.value;
  }

  version(): string {
    return `v${VERSION}`;
  }

  debugInfo(): string {
    return [
      `Version: v${VERSION}`,
      `Runtime: Node.js ${process.versions.node}`,
      'Providers: Vercel AI SDK',
      `Worker: ${this.bridge.started ? 'running' : 'not started'}`
    ].join('\n');
  }

  private send(request: BridgeRequest): BridgeSuccess {
    const response = this.bridge.runBlocking(request);
    if (!response.ok) {
      throw decodeError(response.error);
    }
    return response;
  }
}
