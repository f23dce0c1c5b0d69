/**
 * Layer estimator dispatch
 */

import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { LayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import { estimateAttention } from './attention.js';
import { estimateFfn } from './ffn.js';
import { estimateMoe } from './moe.js';
import { estimateCommunication } from './communication.js';
import { parseRuntimeShape } from './validation.js';

function assertNever(value: never): never {
  throw new Error(`Unhandled layer config: ${JSON.stringify(value)}`);
}

/**
 * Estimate one layer analytically
 */
export function estimateLayer(config: LayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution {
  parseRuntimeShape(runtime);

  switch (config.kind) {
    case 'attention':
      return estimateAttention(config, runtime, hardware);
    case 'ffn':
      return estimateFfn(config, runtime, hardware);
    case 'moe':
      return estimateMoe(config, runtime, hardware);
    case 'communication':
      return estimateCommunication(config, runtime, hardware);
    default:
      return assertNever(config);
  }
}

export { estimateAttention, attentionShape } from './attention.js';
export { estimateFfn } from './ffn.js';
export { estimateMoe, routedTokens } from './moe.js';
export { estimateCommunication, BYTES_PER_MB } from './communication.js';
export { parseRuntimeShape, RuntimeShapeSchema } from './validation.js';
