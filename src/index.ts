/**
 * embedkit
 *
 * Embedding clients behind short configuration strings, with a synchronous
 * binding for host engines that cannot await.
 */

export { ExecutionBridge, type ExecutionBridgeOptions } from './bridge/bridge';
export { getExecutionBridge, type HostBridge, HostBinding, type HostBindingOptions } from './bridge/host';
export type { BridgeRequest, BridgeResponse } from './bridge/protocol';
export { getSettings, loadSettings } from './config/config';
export type { PerformanceConfig, PromptSettings, Settings } from './config/schema';
export * from './core';
export { decodeVector, encodeVector, normalizeL2 } from './providers/embedding/utils';
export type { HandleFactory, ProviderHandle } from './providers/handle';
export { VERSION } from './version';
