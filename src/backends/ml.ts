import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import type { PlausibilityConfig } from '../config/schema.js';
import { estimateLayer } from '../estimators/index.js';
import { dominantLatencyMs, overlapAdjustedLatencyMs } from '../hardware/model.js';
import { BackendUnavailableError, toError } from '../errors/index.js';
import type { LatencyPrediction, LatencyRegressor } from './regressor.js';
import type { EstimatorBackend } from './types.js';

/**
 * Returns the regressor currently loaded, if any
 */
export type RegressorSource = () => LatencyRegressor | null;

/**
 * Reject predictions that are not finite, fall outside [min, max], or stray
 * more than maxDeviationFactor from the analytic dominant latency. A zero
 * analytic latency admits only a zero prediction.
 */
export function checkPlausibility(
  prediction: LatencyPrediction,
  analyticDominantMs: number,
  envelope: PlausibilityConfig
): string | null {
  const { computeTimeMs, memoryTimeMs } = prediction;
  if (!Number.isFinite(computeTimeMs) || !Number.isFinite(memoryTimeMs)) {
    return 'prediction is not finite';
  }
  if (computeTimeMs < 0 || memoryTimeMs < 0) {
    return 'prediction is negative';
  }

  const dominant = dominantLatencyMs(computeTimeMs, memoryTimeMs);
  if (dominant < envelope.minLatencyMs || dominant > envelope.maxLatencyMs) {
    return `predicted ${dominant} ms is outside [${envelope.minLatencyMs}, ${envelope.maxLatencyMs}] ms`;
  }
  if (analyticDominantMs === 0) {
    return dominant === 0 ? null : `predicted ${dominant} ms for a layer with no analytic cost`;
  }
  const ratio = dominant / analyticDominantMs;
  if (ratio > envelope.maxDeviationFactor || ratio < 1 / envelope.maxDeviationFactor) {
    return `predicted ${dominant} ms deviates from analytic ${analyticDominantMs} ms by more than ${envelope.maxDeviationFactor}x`;
  }
  return null;
}

/**
 * Keeps the analytic FLOPs, bytes, features and per-op breakdown and replaces
 * the layer times with a regressor's prediction.
 */
export class MachineLearnedBackend implements EstimatorBackend {
  readonly name = 'ml' as const;

  constructor(
    private readonly source: RegressorSource,
    private readonly envelope: PlausibilityConfig
  ) {}

  estimate(config: LayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution {
    const analytic = estimateLayer(config, runtime, hardware);

    const regressor = this.source();
    if (!regressor) {
      throw new BackendUnavailableError('No latency model is loaded', { layerName: config.name });
    }

    // Nothing computed or moved: the layer costs nothing whatever the intercepts say
    if (analytic.flops === 0 && analytic.bytesRead + analytic.bytesWritten === 0) {
      return Object.freeze({ ...analytic, metadata: Object.freeze({ backend: this.name }) });
    }

    let prediction: LatencyPrediction;
    try {
      prediction = regressor.predict(analytic.layerType, analytic.features);
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        throw error;
      }
      throw new BackendUnavailableError(
        `Latency model failed on layer '${config.name}'`,
        { layerName: config.name },
        toError(error)
      );
    }

    const problem = checkPlausibility(prediction, analytic.dominantLatencyMs, this.envelope);
    if (problem) {
      throw new BackendUnavailableError(`Implausible prediction for layer '${config.name}': ${problem}`, {
        layerName: config.name,
        computeTimeMs: prediction.computeTimeMs,
        memoryTimeMs: prediction.memoryTimeMs,
      });
    }

    const dominant = dominantLatencyMs(prediction.computeTimeMs, prediction.memoryTimeMs);
    return Object.freeze({
      ...analytic,
      computeTimeMs: prediction.computeTimeMs,
      memoryTimeMs: prediction.memoryTimeMs,
      dominantLatencyMs: dominant,
      estimatedExecutionTimeMs: dominant,
      overlapAdjustedLatencyMs: overlapAdjustedLatencyMs(
        prediction.computeTimeMs,
        prediction.memoryTimeMs,
        hardware.overlapEfficiency
      ),
      metadata: Object.freeze({ backend: this.name }),
    });
  }
}
