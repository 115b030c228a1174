/**
 * Error Taxonomy
 *
 * Every error that leaves an embedkit operation is one of these classes.
 * Each carries a string `code` so it can cross the worker-thread boundary
 * as plain data and be rebuilt on the calling side (see bridge/protocol).
 */

// ============================================================
// CONFIGURATION
// ============================================================

export type ConfigErrorKind = 'UNKNOWN_PROVIDER' | 'MALFORMED_INPUT' | 'MISSING_CREDENTIAL';

/**
 * Raised while resolving a client configuration or loading settings.
 * Always thrown at registration time, never on first use.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    public readonly kind: ConfigErrorKind,
    public readonly clientName?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ClientNotFoundError extends Error {
  readonly code = 'CLIENT_NOT_FOUND';

  constructor(public readonly clientName: string) {
    super(`Client with name '${clientName}' was not registered.`);
    this.name = 'ClientNotFoundError';
  }
}

// ============================================================
// PROVIDER
// ============================================================

export type ProviderErrorType =
  | 'AUTHENTICATION' // 401/403 from the provider
  | 'QUOTA' // 429, rate or quota exhausted
  | 'TRANSPORT' // network failure or 5xx
  | 'TIMEOUT' // request aborted by the request timeout
  | 'INVALID_RESPONSE' // provider answered without usable content
  | 'REQUEST'; // rejected input or anything else

export type ProviderStage = 'embed' | 'describe';

/**
 * Failure reported by the provider library for one request.
 * Not retried by embedkit; the AI SDK applies its own retry policy first.
 */
export class ProviderError extends Error {
  readonly code = 'PROVIDER_ERROR';
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: ProviderErrorType,
    public readonly clientName: string,
    public readonly stage: ProviderStage,
    cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
    this.cause = cause;
  }

  /**
   * Whether the failure is likely to go away on its own (network, quota, timeout),
   * as opposed to a configuration mistake such as a bad key or model name.
   */
  get transient(): boolean {
    return this.type === 'TRANSPORT' || this.type === 'QUOTA' || this.type === 'TIMEOUT';
  }
}

// ============================================================
// CAPABILITY & RUNTIME
// ============================================================

export class UnsupportedOperationError extends Error {
  readonly code = 'UNSUPPORTED_OPERATION';

  constructor(
    public readonly clientName: string,
    public readonly operation: string,
    public readonly reason: string
  ) {
    super(`Client '${clientName}' does not support ${operation}: ${reason}`);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * The execution bridge could not run a task to completion: the worker failed
 * to start, the task threw unexpectedly, or the bridge timed out.
 */
export class BridgeError extends Error {
  readonly code = 'BRIDGE_ERROR';
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'BridgeError';
    this.cause = cause;
  }
}

export type EmbedkitError =
  | ConfigError
  | ClientNotFoundError
  | ProviderError
  | UnsupportedOperationError
  | BridgeError;

export function isEmbedkitError(error: unknown): error is EmbedkitError {
  return (
    error instanceof ConfigError ||
    error instanceof ClientNotFoundError ||
    error instanceof ProviderError ||
    error instanceof UnsupportedOperationError ||
    error instanceof BridgeError
  );
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
