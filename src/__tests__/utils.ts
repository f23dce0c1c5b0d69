/**
 * Test utilities and builders
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { EstimatorBackend } from '../backends/types.js';
import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type {
  AttentionConfig,
  AttentionLayerConfig,
  CommunicationConfig,
  CommunicationLayerConfig,
  FfnConfig,
  FfnLayerConfig,
  LayerConfig,
  MoeConfig,
  MoeLayerConfig,
} from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';

/**
 * Round numbers: 100 TFLOPS, 1000 GB/s HBM, 100 GB/s interconnect
 */
export function createMockHardware(overrides?: Partial<HardwareSpec>): HardwareSpec {
  return {
    name: 'TestGPU',
    peakTflops: 100,
    memoryBandwidthGbps: 1000,
    hbmGb: 80,
    interconnectGbps: 100,
    maxConcurrency: 1,
    overlapEfficiency: 1,
    ...overrides,
  };
}

export function createRuntime(batchSize = 1, seqLen = 128, extra?: Partial<RuntimeShape>): RuntimeShape {
  return { batchSize, seqLen, ...extra };
}

export function attentionLayer(config?: Partial<AttentionConfig>, name = 'attn', index = 0): AttentionLayerConfig {
  return {
    kind: 'attention',
    name,
    index,
    attention: { dModel: 1024, numHeads: 16, dtypeBits: 16, ...config },
  };
}

export function ffnLayer(config?: Partial<FfnConfig>, name = 'ffn', index = 0): FfnLayerConfig {
  return {
    kind: 'ffn',
    name,
    index,
    ffn: { dModel: 1024, dFf: 4096, activation: 'gelu', dtypeBits: 16, ...config },
  };
}

export function moeLayer(config?: Partial<MoeConfig>, name = 'moe', index = 0): MoeLayerConfig {
  return {
    kind: 'moe',
    name,
    index,
    moe: {
      dModel: 1024,
      expertIntermediateSize: 2048,
      numExperts: 8,
      expertsPerToken: 2,
      numGroups: 1,
      numSharedExperts: 0,
      expertParallel: 1,
      gated: false,
      dtypeBits: 16,
      ...config,
    },
  };
}

export function communicationLayer(
  config?: Partial<CommunicationConfig>,
  name = 'comm',
  index = 0
): CommunicationLayerConfig {
  return {
    kind: 'communication',
    name,
    index,
    communication: { pattern: 'all_to_all', payloadMb: 16, ...config },
  };
}

/**
 * A LayerExecution with the given dominant latency, split as pure compute
 */
export function createExecution(layerName: string, latencyMs: number, overrides?: Partial<LayerExecution>): LayerExecution {
  return {
    layerName,
    layerType: 'ffn',
    flops: 1e9,
    bytesRead: 1e6,
    bytesWritten: 1e6,
    computeTimeMs: latencyMs,
    memoryTimeMs: 0,
    dominantLatencyMs: latencyMs,
    estimatedExecutionTimeMs: latencyMs,
    overlapAdjustedLatencyMs: latencyMs,
    breakdown: {},
    features: {},
    metadata: { backend: 'analytic' },
    ...overrides,
  };
}

/**
 * Backend returning canned executions keyed by layer name
 */
export function createStubBackend(
  executions: Record<string, LayerExecution | Error>,
  name: EstimatorBackend['name'] = 'analytic'
): EstimatorBackend & { calls: string[] } {
  const calls: string[] = [];
  return {
    name,
    calls,
    estimate(config: LayerConfig): LayerExecution {
      calls.push(config.name);
      const canned = executions[config.name];
      if (canned === undefined) {
        throw new Error(`No canned execution for ${config.name}`);
      }
      if (canned instanceof Error) {
        throw canned;
      }
      return canned;
    },
  };
}

/**
 * Logger stand-in that records messages per level
 */
export function createRecordingLogger() {
  const entries: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string; metadata?: object }> = [];
  return {
    entries,
    debug: (message: string, metadata?: object) => {
      entries.push({ level: 'debug', message, metadata });
    },
    info: (message: string, metadata?: object) => {
      entries.push({ level: 'info', message, metadata });
    },
    warn: (message: string, metadata?: object) => {
      entries.push({ level: 'warn', message, metadata });
    },
    error: (message: string, _error?: Error, metadata?: object) => {
      entries.push({ level: 'error', message, metadata });
    },
  };
}

/**
 * Temporary directory with the given files; call cleanup() when done
 */
export function createTempFiles(files: Record<string, string>): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'infersim-test-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Mock environment variables for a test
 */
export function withEnv<T>(envVars: Record<string, string | undefined>, fn: () => T): T {
  const originalEnv = { ...process.env };
  for (const [key, value] of Object.entries(envVars)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    return fn();
  } finally {
    process.env = originalEnv;
  }
}
