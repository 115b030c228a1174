/**
 * Bridge Protocol
 *
 * Messages between the host thread and the worker. Requests are trusted
 * (only HostBinding sends them); responses are validated on arrival.
 * Domain errors travel as values keyed by their `code` and are rebuilt as
 * the same error classes on the host side.
 */

import { z } from 'zod';
import { embeddingProviders, performanceSchema, visionProviders } from '@/config/schema';
import {
  BridgeError,
  ClientNotFoundError,
  ConfigError,
  type EmbedkitError,
  ProviderError,
  UnsupportedOperationError
} from '@/core/errors';
import type { ClientDescriptor, ClientSummary, MultimodalResult } from '@/core/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Requests
// ═══════════════════════════════════════════════════════════════════════════════

export type BridgeRequest =
  | { op: 'register'; name: string; descriptor: ClientDescriptor }
  | { op: 'embedOne'; name: string; text: string }
  | { op: 'embedMany'; name: string; texts: string[] }
  | { op: 'embedImage'; name: string; image: Uint8Array; prompt?: string }
  | { op: 'processMultimodal'; name: string; items: Uint8Array[]; prompt?: string }
  | { op: 'listClients' };

export type BridgeOp = BridgeRequest['op'];

// ═══════════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════════

const serializedErrorSchema = z.discriminatedUnion('code', [
  z.object({
    code: z.literal('CONFIG_ERROR'),
    message: z.string(),
    kind: z.enum(['UNKNOWN_PROVIDER', 'MALFORMED_INPUT', 'MISSING_CREDENTIAL']),
    clientName: z.string().optional()
  }),
  z.object({
    code: z.literal('CLIENT_NOT_FOUND'),
    message: z.string(),
    clientName: z.string()
  }),
  z.object({
    code: z.literal('PROVIDER_ERROR'),
    message: z.string(),
    type: z.enum(['AUTHENTICATION', 'QUOTA', 'TRANSPORT', 'TIMEOUT', 'INVALID_RESPONSE', 'REQUEST']),
    clientName: z.string(),
    stage: z.enum(['embed', 'describe'])
  }),
  z.object({
    code: z.literal('UNSUPPORTED_OPERATION'),
    message: z.string(),
    clientName: z.string(),
    operation: z.string(),
    reason: z.string()
  }),
  z.object({
    code: z.literal('BRIDGE_ERROR'),
    message: z.string()
  })
]);

export type SerializedError = z.infer<typeof serializedErrorSchema>;

export function encodeError(error: EmbedkitError): SerializedError {
  if (error instanceof ConfigError) {
    return {
      code: error.code,
      message: error.message,
      kind: error.kind,
      ...(error.clientName !== undefined ? { clientName: error.clientName } : {})
    };
  }
  if (error instanceof ClientNotFoundError) {
    return { code: error.code, message: error.message, clientName: error.clientName };
  }
  if (error instanceof ProviderError) {
    return {
      code: error.code,
      message: error.message,
      type: error.type,
      clientName: error.clientName,
      stage: error.stage
    };
  }
  if (error instanceof UnsupportedOperationError) {
    return {
      code: error.code,
      message: error.message,
      clientName: error.clientName,
      operation: error.operation,
      reason: error.reason
    };
  }
  return { code: error.code, message: error.message };
}

export function decodeError(serialized: SerializedError): EmbedkitError {
  switch (serialized.code) {
    case 'CONFIG_ERROR':
      return new ConfigError(serialized.message, serialized.kind, serialized.clientName);
    case 'CLIENT_NOT_FOUND':
      return new ClientNotFoundError(serialized.clientName);
    case 'PROVIDER_ERROR':
      return new ProviderError(
        serialized.message,
        serialized.type,
        serialized.clientName,
        serialized.stage
      );
    case 'UNSUPPORTED_OPERATION':
      return new UnsupportedOperationError(
        serialized.clientName,
        serialized.operation,
        serialized.reason
      );
    case 'BRIDGE_ERROR':
      return new BridgeError(serialized.message);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Responses
// ═══════════════════════════════════════════════════════════════════════════════

const vectorSchema = z.array(z.number());

const clientSummarySchema: z.ZodType<ClientSummary> = z.object({
  name: z.string(),
  provider: z.enum(embeddingProviders),
  model: z.string(),
  hasCredential: z.boolean(),
  endpoint: z.string().optional(),
  dimensions: z.number().optional(),
  vision: z.object({ provider: z.enum(visionProviders), model: z.string() }).optional(),
  performance: performanceSchema
});

const multimodalResultSchema: z.ZodType<MultimodalResult> = z.object({
  results: z.array(
    z.discriminatedUnion('status', [
      z.object({ status: z.literal('success'), embedding: vectorSchema }),
      z.object({
        status: z.literal('failure'),
        stage: z.enum(['describe', 'embed', 'timeout']),
        error: z.string()
      })
    ])
  ),
  stats: z.object({
    totalProcessed: z.number(),
    successful: z.number(),
    failed: z.number(),
    totalDurationMs: z.number(),
    avgDurationPerItemMs: z.number(),
    throughput: z.number()
  })
});

const successSchema = z.discriminatedUnion('op', [
  z.object({ ok: z.literal(true), op: z.literal('register'), value: clientSummarySchema }),
  z.object({ ok: z.literal(true), op: z.literal('embedOne'), value: vectorSchema }),
  z.object({ ok: z.literal(true), op: z.literal('embedMany'), value: z.array(vectorSchema) }),
  z.object({ ok: z.literal(true), op: z.literal('embedImage'), value: vectorSchema }),
  z.object({ ok: z.literal(true), op: z.literal('processMultimodal'), value: multimodalResultSchema }),
  z.object({ ok: z.literal(true), op: z.literal('listClients'), value: z.array(clientSummarySchema) })
]);

const failureSchema = z.object({
  ok: z.literal(false),
  error: serializedErrorSchema
});

export const bridgeResponseSchema = z.union([successSchema, failureSchema]);

export type BridgeSuccess = z.infer<typeof successSchema>;
export type BridgeFailure = z.infer<typeof failureSchema>;
export type BridgeResponse = z.infer<typeof bridgeResponseSchema>;

/** Validate a worker answer; throws a ZodError when it does not fit. */
export function decodeResponse(value: unknown): BridgeResponse {
  return bridgeResponseSchema.parse(value);
}
