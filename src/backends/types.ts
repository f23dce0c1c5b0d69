import type { BackendName, LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import type { Logger } from '../logger/index.js';

/**
 * Anything that can turn one layer config into a LayerExecution
 */
export interface EstimatorBackend {
  readonly name: BackendName;
  estimate(config: LayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution;
}

export type BackendLogger = Pick<Logger, 'debug' | 'info' | 'warn'>;
