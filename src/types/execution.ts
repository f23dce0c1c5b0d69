/**
 * Estimation output type definitions
 */

import type { LayerKind } from './layers.js';
import type { TransferChannel } from './hardware.js';

/**
 * FLOP and byte counts of one fused kernel
 */
export interface FusionMetrics {
  readonly name: string;
  readonly flops: number;
  readonly bytesRead: number;
  readonly bytesWritten: number;
  readonly channel: TransferChannel;
}

export interface OpCost {
  readonly flops: number;
  readonly bytesRead: number;
  readonly bytesWritten: number;
  readonly computeTimeMs: number;
  readonly memoryTimeMs: number;
}

export type BackendName = 'analytic' | 'ml';

export interface FallbackRecord {
  readonly from: BackendName;
  readonly reason: string;
}

export interface ExecutionMetadata {
  readonly backend: BackendName;
  readonly fallback?: FallbackRecord;
}

export interface LayerExecution {
  readonly layerName: string;
  readonly layerType: LayerKind;
  readonly flops: number;
  readonly bytesRead: number;
  readonly bytesWritten: number;
  readonly computeTimeMs: number;
  readonly memoryTimeMs: number;
  /** max(computeTimeMs, memoryTimeMs) */
  readonly dominantLatencyMs: number;
  /** Stable alias of dominantLatencyMs for downstream consumers */
  readonly estimatedExecutionTimeMs: number;
  /** Dominant side plus the non-overlapped share of the other side */
  readonly overlapAdjustedLatencyMs: number;
  readonly breakdown: Readonly<Record<string, OpCost>>;
  readonly features: Readonly<Record<string, number>>;
  readonly metadata: ExecutionMetadata;
}

export interface SimulationResult {
  readonly layers: readonly LayerExecution[];
  readonly totalLatencyMs: number;
  readonly totalOverlapAdjustedLatencyMs: number;
  readonly totalFlops: number;
  readonly peakMemoryBytes: number;
  readonly bottleneckLayer: string | null;
  readonly backend: string;
}
