/**
 * Turns a layer's fused-op metrics into a LayerExecution
 */

import type { FusionMetrics, LayerExecution, OpCost } from '../types/execution.js';
import type { HardwareSpec, TransferChannel } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import {
  concurrencyHintFor,
  dominantLatencyMs,
  overlapAdjustedLatencyMs,
  timeFor,
} from '../hardware/model.js';

const CHANNELS: readonly TransferChannel[] = ['memory', 'interconnect'];

export interface OpSummaryInput {
  layer: LayerConfig;
  runtime: RuntimeShape;
  hardware: HardwareSpec;
  ops: readonly FusionMetrics[];
  /** Shape scalars of this layer type; the key set must not vary between calls */
  shapeFeatures: Record<string, number>;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * Sum FLOPs and bytes over the ops, time each channel's aggregate once, and
 * take the dominant latency over the summed times (never the sum of per-op
 * maxima).
 */
export function summarizeOps(input: OpSummaryInput): LayerExecution {
  const { layer, runtime, hardware, ops } = input;
  const concurrencyHint = concurrencyHintFor(runtime);

  const breakdown: Record<string, OpCost> = {};
  for (const op of ops) {
    const timing = timeFor(op.flops, op.bytesRead, op.bytesWritten, hardware, {
      concurrencyHint,
      channel: op.channel,
    });
    breakdown[op.name] = {
      flops: op.flops,
      bytesRead: op.bytesRead,
      bytesWritten: op.bytesWritten,
      computeTimeMs: timing.computeTimeMs,
      memoryTimeMs: timing.memoryTimeMs,
    };
  }

  let computeTimeMs = 0;
  let memoryTimeMs = 0;
  for (const channel of CHANNELS) {
    const members = ops.filter((op) => op.channel === channel);
    if (members.length === 0) {
      continue;
    }
    const timing = timeFor(
      sum(members.map((op) => op.flops)),
      sum(members.map((op) => op.bytesRead)),
      sum(members.map((op) => op.bytesWritten)),
      hardware,
      { concurrencyHint, channel }
    );
    computeTimeMs += timing.computeTimeMs;
    memoryTimeMs += timing.memoryTimeMs;
  }

  const flops = sum(ops.map((op) => op.flops));
  const bytesRead = sum(ops.map((op) => op.bytesRead));
  const bytesWritten = sum(ops.map((op) => op.bytesWritten));
  const dominant = dominantLatencyMs(computeTimeMs, memoryTimeMs);

  const features: Record<string, number> = {
    ...input.shapeFeatures,
    layerIndex: layer.index,
    batchSize: runtime.batchSize,
    seqLen: runtime.seqLen,
    microBatch: runtime.microBatch ?? 0,
    tokensPerExpert: runtime.tokensPerExpert ?? 0,
    concurrencyHint,
    flops,
    bytesRead,
    bytesWritten,
  };

  return Object.freeze({
    layerName: layer.name,
    layerType: layer.kind,
    flops,
    bytesRead,
    bytesWritten,
    computeTimeMs,
    memoryTimeMs,
    dominantLatencyMs: dominant,
    estimatedExecutionTimeMs: dominant,
    overlapAdjustedLatencyMs: overlapAdjustedLatencyMs(computeTimeMs, memoryTimeMs, hardware.overlapEfficiency),
    breakdown: Object.freeze(breakdown),
    features: Object.freeze(features),
    metadata: Object.freeze({ backend: 'analytic' as const }),
  });
}
