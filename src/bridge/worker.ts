/**
 * Bridge worker entry point. Holds the session's EmbeddingContext and
 * answers one request per blocking host call.
 */

import { runAsWorker } from 'synckit';
import { EmbeddingContext } from '@/core/context';
import { dispatch } from './dispatch';
import type { BridgeRequest, BridgeResponse } from './protocol';

let context: EmbeddingContext | null = null;

function getContext(): EmbeddingContext {
  if (!context) {
    context = new EmbeddingContext();
  }
  return context;
}

runAsWorker(async (request: BridgeRequest): Promise<BridgeResponse> => dispatch(getContext(), request));
