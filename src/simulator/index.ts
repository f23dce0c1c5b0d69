/**
 * Simulator: sequential aggregation of per-layer estimates
 */

import type { LayerExecution, SimulationResult } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import type { EstimatorBackend } from '../backends/types.js';
import { AggregationAbortedError, toError } from '../errors/index.js';

export interface SweepPoint {
  runtime: RuntimeShape;
  result: SimulationResult;
}

/**
 * Estimate every layer in order and fold the results.
 *
 * Layers run back to back, so total latency is the plain sum of dominant
 * latencies. Peak memory is the largest single-layer traffic
 * (bytesRead + bytesWritten), interconnect traffic included. The bottleneck
 * is the first layer with the largest dominant latency.
 */
export function runSimulation(
  layers: readonly LayerConfig[],
  hardware: HardwareSpec,
  runtime: RuntimeShape,
  backend: EstimatorBackend
): SimulationResult {
  const executions: LayerExecution[] = [];
  let totalLatencyMs = 0;
  let totalOverlapAdjustedLatencyMs = 0;
  let totalFlops = 0;
  let peakMemoryBytes = 0;
  let bottleneckLayer: string | null = null;
  let bottleneckLatency = Number.NEGATIVE_INFINITY;

  layers.forEach((layer, position) => {
    let execution: LayerExecution;
    try {
      execution = backend.estimate(layer, runtime, hardware);
    } catch (error) {
      throw new AggregationAbortedError(layer.name, position, toError(error));
    }

    executions.push(execution);
    totalLatencyMs += execution.dominantLatencyMs;
    totalOverlapAdjustedLatencyMs += execution.overlapAdjustedLatencyMs;
    totalFlops += execution.flops;
    peakMemoryBytes = Math.max(peakMemoryBytes, execution.bytesRead + execution.bytesWritten);
    if (execution.dominantLatencyMs > bottleneckLatency) {
      bottleneckLatency = execution.dominantLatencyMs;
      bottleneckLayer = execution.layerName;
    }
  });

  return Object.freeze({
    layers: Object.freeze(executions),
    totalLatencyMs,
    totalOverlapAdjustedLatencyMs,
    totalFlops,
    peakMemoryBytes,
    bottleneckLayer,
    backend: backend.name,
  });
}

/**
 * One independent simulation per runtime shape, in input order
 */
export function runSweep(
  layers: readonly LayerConfig[],
  hardware: HardwareSpec,
  runtimes: readonly RuntimeShape[],
  backend: EstimatorBackend
): SweepPoint[] {
  return runtimes.map((runtime) => ({ runtime, result: runSimulation(layers, hardware, runtime, backend) }));
}

export { loadScenario, parseScenario, readDocument, SUPPORTED_LAYER_TYPES, type Scenario } from './scenario.js';
export * from './report.js';
