import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import { BackendUnavailableError } from '../errors/index.js';
import { AnalyticBackend } from './analytic.js';
import type { BackendLogger, EstimatorBackend } from './types.js';

/**
 * Serves from the primary backend and falls back to another (analytic by
 * default) when the primary reports BackendUnavailableError. Every other
 * error propagates.
 */
export class FallbackBackend implements EstimatorBackend {
  constructor(
    private readonly primary: EstimatorBackend,
    private readonly fallback: EstimatorBackend = new AnalyticBackend(),
    private readonly logger?: BackendLogger
  ) {}

  get name(): EstimatorBackend['name'] {
    return this.primary.name;
  }

  estimate(config: LayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution {
    try {
      return this.primary.estimate(config, runtime, hardware);
    } catch (error) {
      if (!(error instanceof BackendUnavailableError)) {
        throw error;
      }

      this.logger?.warn(`Backend '${this.primary.name}' unavailable, using '${this.fallback.name}'`, {
        layerName: config.name,
        reason: error.message,
      });

      const result = this.fallback.estimate(config, runtime, hardware);
      return Object.freeze({
        ...result,
        metadata: Object.freeze({
          ...result.metadata,
          fallback: Object.freeze({ from: this.primary.name, reason: error.message }),
        }),
      });
    }
  }
}
