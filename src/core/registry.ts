/**
 * Client Registry
 *
 * Name → RegisteredClient table. Handles are constructed eagerly, so a bad
 * descriptor fails at registration. Registrations are serialised so that two
 * registrations of one name land in call order; lookups take no lock.
 */

import { Mutex } from 'async-mutex';
import { DEFAULT_PROMPTS, type PromptSettings } from '@/config/schema';
import { createProviderHandle, type HandleFactory } from '@/providers/handle';
import { logClientRegistered } from '@/utils/logger';
import { ClientNotFoundError, ConfigError, errorMessage } from './errors';
import { ConcurrencyController } from './scheduler';
import type { ClientDescriptor, ClientSummary, RegisteredClient } from './types';

export interface ClientRegistryOptions {
  /** Budget for clients without a dedicated maxConcurrency */
  shared: ConcurrencyController;
  createHandle?: HandleFactory;
  prompts?: PromptSettings;
}

export function summarizeClient(client: RegisteredClient): ClientSummary {
  const { descriptor } = client;
  const summary: ClientSummary = {
    name: client.name,
    provider: descriptor.provider,
    model: descriptor.model,
    hasCredential: descriptor.credential !== undefined,
    performance: { ...descriptor.performance }
  };
  if (descriptor.endpoint) summary.endpoint = descriptor.endpoint;
  if (descriptor.dimensions !== undefined) summary.dimensions = descriptor.dimensions;
  if (descriptor.vision) {
    summary.vision = { provider: descriptor.vision.provider, model: descriptor.vision.model };
  }
  return summary;
}

export class ClientRegistry {
  private readonly clients = new Map<string, RegisteredClient>();
  private readonly lock = new Mutex();
  private readonly shared: ConcurrencyController;
  private readonly createHandle: HandleFactory;
  private readonly prompts: PromptSettings;

  constructor(options: ClientRegistryOptions) {
    this.shared = options.shared;
    this.createHandle = options.createHandle ?? createProviderHandle;
    this.prompts = options.prompts ?? DEFAULT_PROMPTS;
  }

  /**
   * Register (or replace) a client. The previous entry under the same name,
   * if any, is dropped.
   */
  register(name: string, descriptor: ClientDescriptor): Promise<RegisteredClient> {
    return this.lock.runExclusive(async () => {
      let handle: RegisteredClient['handle'];
      try {
        handle = await this.createHandle(descriptor, this.prompts);
      } catch (error) {
        throw new ConfigError(
          `Could not construct provider for client '${name}': ${errorMessage(error)}`,
          'MALFORMED_INPUT',
          name
        );
      }

      const client: RegisteredClient = {
        name,
        descriptor,
        handle,
        concurrency: descriptor.dedicatedBudget
          ? new ConcurrencyController(descriptor.performance.maxConcurrency)
          : this.shared,
        registeredAt: new Date()
      };

      this.clients.set(name, client);
      logClientRegistered(name, descriptor);
      return client;
    });
  }

  lookup(name: string): RegisteredClient {
    const client = this.clients.get(name);
    if (!client) {
      throw new ClientNotFoundError(name);
    }
    return client;
  }

  has(name: string): boolean {
    return this.clients.has(name);
  }

  /** One summary per name, without credentials */
  list(): ClientSummary[] {
    return [...this.clients.values()].map(summarizeClient);
  }

  get size(): number {
    return this.clients.size;
  }

  clear(): void {
    this.clients.clear();
  }
}
