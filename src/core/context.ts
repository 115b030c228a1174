/**
 * Embedding Context
 *
 * Owns everything one session needs: settings, the client registry, the
 * shared concurrency budget and the handle factory. Every operation of the
 * host binding exists here in async form; the bridge worker holds one
 * context and forwards requests to it.
 */

import { getSettings } from '@/config/config';
import type { Settings } from '@/config/schema';
import type { HandleFactory } from '@/providers/handle';
import { configureLogger } from '@/utils/logger';
import {
  embedImage,
  embedMany,
  embedOne,
  type MultimodalOptions,
  processMultimodal
} from './operations';
import { ClientRegistry, summarizeClient } from './registry';
import { type ConfigInput, resolveClientConfig } from './resolver';
import { ConcurrencyController } from './scheduler';
import type { ClientDescriptor, ClientSummary, MultimodalResult } from './types';

export interface EmbeddingContextOptions {
  /** Defaults to the settings file (config/embedkit.json or EMBEDKIT_CONFIG) */
  settings?: Settings;
  createHandle?: HandleFactory;
  /** Environment for credential fallback (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class EmbeddingContext {
  readonly settings: Settings;
  private readonly env: NodeJS.ProcessEnv;
  private readonly registry: ClientRegistry;

  constructor(options: EmbeddingContextOptions = {}) {
    this.settings = options.settings ?? getSettings();
    this.env = options.env ?? process.env;

    configureLogger(this.settings.logging);

    this.registry = new ClientRegistry({
      shared: new ConcurrencyController(this.settings.performance.maxConcurrency),
      createHandle: options.createHandle,
      prompts: this.settings.prompts
    });
  }

  /** Resolve a configuration in-process, then register it. */
  async register(name: string, config: ConfigInput): Promise<ClientSummary> {
    const descriptor = resolveClientConfig(config, {
      clientName: name,
      env: this.env,
      performance: this.settings.performance
    });
    return this.registerResolved(name, descriptor);
  }

  /** Register a descriptor resolved elsewhere (the host thread). */
  async registerResolved(name: string, descriptor: ClientDescriptor): Promise<ClientSummary> {
    const client = await this.registry.register(name, descriptor);
    return summarizeClient(client);
  }

  async embedOne(name: string, text: string): Promise<number[]> {
    return embedOne(this.registry.lookup(name), text);
  }

  async embedMany(name: string, texts: readonly string[]): Promise<number[][]> {
    return embedMany(this.registry.lookup(name), texts);
  }

  async embedImage(name: string, image: Uint8Array, prompt?: string): Promise<number[]> {
    return embedImage(this.registry.lookup(name), image, prompt);
  }

  async processMultimodal(
    name: string,
    items: readonly Uint8Array[],
    options: MultimodalOptions = {}
  ): Promise<MultimodalResult> {
    return processMultimodal(this.registry.lookup(name), items, options);
  }

  listClients(): ClientSummary[] {
    return this.registry.list();
  }

  hasClient(name: string): boolean {
    return this.registry.has(name);
  }

  /** Drop every client */
  clear(): void {
    this.registry.clear();
  }
}
