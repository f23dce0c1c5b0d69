/**
 * Hardware model
 * Converts FLOP and byte counts into compute and transfer time
 */

import type { HardwareSpec, OpTiming, TimingOptions } from '../types/hardware.js';
import type { RuntimeShape } from '../types/runtime.js';
import { FormulaDomainError } from '../errors/index.js';

const TERA = 1e12;
const GIGA = 1e9;
const MS_PER_SECOND = 1000;

/**
 * Streams (micro-batches) that can run side by side, capped by the device
 */
export function effectiveConcurrency(hardware: HardwareSpec, concurrencyHint = 1): number {
  const requested = Math.max(1, Math.floor(concurrencyHint));
  return Math.min(requested, hardware.maxConcurrency);
}

/**
 * One stream per micro-batch; a single stream without micro-batching
 */
export function concurrencyHintFor(runtime: RuntimeShape): number {
  if (runtime.microBatch === undefined) {
    return 1;
  }
  return Math.ceil(runtime.batchSize / runtime.microBatch);
}

export function bandwidthFor(hardware: HardwareSpec, channel: TimingOptions['channel'] = 'memory'): number {
  return channel === 'interconnect' ? hardware.interconnectGbps : hardware.memoryBandwidthGbps;
}

/**
 * Raw (un-overlapped) compute and transfer time of a FLOP/byte pair
 */
export function timeFor(
  flops: number,
  bytesRead: number,
  bytesWritten: number,
  hardware: HardwareSpec,
  options: TimingOptions = {}
): OpTiming {
  const channel = options.channel ?? 'memory';
  const concurrency = effectiveConcurrency(hardware, options.concurrencyHint);

  const computeTimeMs = ((flops / (hardware.peakTflops * TERA)) * MS_PER_SECOND) / concurrency;

  const bytes = bytesRead + bytesWritten;
  if (bytes === 0) {
    return { computeTimeMs, memoryTimeMs: 0 };
  }

  const bandwidth = bandwidthFor(hardware, channel);
  if (bandwidth <= 0) {
    throw new FormulaDomainError(`Hardware '${hardware.name}' has no ${channel} bandwidth to move ${bytes} bytes`, {
      hardware: hardware.name,
      channel,
      bytes,
    });
  }

  return { computeTimeMs, memoryTimeMs: (bytes / (bandwidth * GIGA)) * MS_PER_SECOND };
}

export function dominantLatencyMs(computeTimeMs: number, memoryTimeMs: number): number {
  return Math.max(computeTimeMs, memoryTimeMs);
}

/**
 * The dominant side is picked from the raw times; only the other side is
 * discounted by how well the two phases overlap.
 */
export function overlapAdjustedLatencyMs(
  computeTimeMs: number,
  memoryTimeMs: number,
  overlapEfficiency: number
): number {
  const dominant = Math.max(computeTimeMs, memoryTimeMs);
  const hidden = Math.min(computeTimeMs, memoryTimeMs);
  return dominant + (1 - overlapEfficiency) * hidden;
}
