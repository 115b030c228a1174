import type { EmbeddingProvider, PerformanceConfig, VisionProvider } from '@/config/schema';
import type { ProviderHandle } from '@/providers/handle';
import type { ConcurrencyController } from './scheduler';

export type { EmbeddingProvider, PerformanceConfig, VisionProvider };

// ═══════════════════════════════════════════════════════════════════════════════
// Client Descriptor
// ═══════════════════════════════════════════════════════════════════════════════

export interface VisionDescriptor {
  provider: VisionProvider;
  model: string;
  credential?: string;
  endpoint?: string;
}

/**
 * Canonical, validated configuration of one client.
 * Produced by the resolver; never mutated afterwards.
 */
export interface ClientDescriptor {
  provider: EmbeddingProvider;
  model: string;
  /** Secret for the embedding provider. Never echoed back in summaries or logs. */
  credential?: string;
  endpoint?: string;
  /** Output dimensionality requested from providers that support reduction */
  dimensions?: number;
  /** L2-normalize every vector before returning it */
  normalize: boolean;
  /** Describe-stage model; multimodal operations need it */
  vision?: VisionDescriptor;
  performance: PerformanceConfig;
  /** True when maxConcurrency was set explicitly, giving the client its own budget */
  dedicatedBudget: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Registry
// ═══════════════════════════════════════════════════════════════════════════════

export interface RegisteredClient {
  readonly name: string;
  readonly descriptor: ClientDescriptor;
  readonly handle: ProviderHandle;
  /** Shared context budget, or a dedicated one when descriptor.dedicatedBudget */
  readonly concurrency: ConcurrencyController;
  readonly registeredAt: Date;
}

/**
 * Public view of a registered client. Carries no credential.
 */
export interface ClientSummary {
  name: string;
  provider: EmbeddingProvider;
  model: string;
  hasCredential: boolean;
  endpoint?: string;
  dimensions?: number;
  vision?: { provider: VisionProvider; model: string };
  performance: PerformanceConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Multimodal Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

/** Where an item failed: in a provider stage, or by exceeding the request timeout */
export type PipelineStage = 'describe' | 'embed' | 'timeout';

export type PipelineItemResult =
  | { status: 'success'; embedding: number[] }
  | { status: 'failure'; stage: PipelineStage; error: string };

export interface ProcessingStats {
  totalProcessed: number;
  successful: number;
  failed: number;
  totalDurationMs: number;
  avgDurationPerItemMs: number;
  /** Items per second; zero when no time elapsed */
  throughput: number;
}

export interface MultimodalResult {
  /** Same length as the input; slot i belongs to input i */
  results: PipelineItemResult[];
  stats: ProcessingStats;
}
