/**
 * Hardware profile type definitions
 */

/**
 * One accelerator target. Immutable once parsed.
 */
export interface HardwareSpec {
  readonly name: string;
  readonly peakTflops: number;
  readonly memoryBandwidthGbps: number;
  readonly hbmGb: number;
  readonly interconnectGbps: number;
  readonly maxConcurrency: number;
  readonly overlapEfficiency: number;
}

/**
 * Bandwidth a kernel's bytes travel over
 */
export type TransferChannel = 'memory' | 'interconnect';

export interface TimingOptions {
  concurrencyHint?: number;
  channel?: TransferChannel;
}

export interface OpTiming {
  computeTimeMs: number;
  memoryTimeMs: number;
}

/**
 * Catalog entry in data/hardware-presets.json
 */
export interface HardwarePreset {
  id: string;
  description: string;
  spec: HardwareSpec;
}
