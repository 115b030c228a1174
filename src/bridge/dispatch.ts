/**
 * Worker-side request dispatch.
 *
 * Domain errors become failure responses; anything else is rethrown and
 * surfaces on the host as a BridgeError.
 */

import type { EmbeddingContext } from '@/core/context';
import { isEmbedkitError } from '@/core/errors';
import { type BridgeRequest, type BridgeResponse, type BridgeSuccess, encodeError } from './protocol';

async function execute(context: EmbeddingContext, request: BridgeRequest): Promise<BridgeSuccess> {
  switch (request.op) {
    case 'register':
      return {
        ok: true,
        op: 'register',
        value: await context.registerResolved(request.name, request.descriptor)
      };
    case 'embedOne':
      return { ok: true, op: 'embedOne', value: await context.embedOne(request.name, request.text) };
    case 'embedMany':
      return { ok: true, op: 'embedMany', value: await context.embedMany(request.name, request.texts) };
    case 'embedImage':
      return {
        ok: true,
        op: 'embedImage',
        value: await context.embedImage(request.name, request.image, request.prompt)
      };
    case 'processMultimodal':
      return {
        ok: true,
        op: 'processMultimodal',
        value: await context.processMultimodal(request.name, request.items, {
          prompt: request.prompt
        })
      };
    case 'listClients':
      return { ok: true, op: 'listClients', value: context.listClients() };
  }
}

export async function dispatch(context: EmbeddingContext, request: BridgeRequest): Promise<BridgeResponse> {
  try {
    return await execute(context, request);
  } catch (error) {
    if (isEmbedkitError(error)) {
      return { ok: false, error: encodeError(error) };
    }
    throw error;
  }
}
