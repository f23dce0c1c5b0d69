import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import { estimateLayer } from '../estimators/index.js';
import type { EstimatorBackend } from './types.js';

/**
 * Closed-form roofline estimates from the fused-op library
 */
export class AnalyticBackend implements EstimatorBackend {
  readonly name = 'analytic' as const;

  estimate(config: LayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution {
    return estimateLayer(config, runtime, hardware);
  }
}
