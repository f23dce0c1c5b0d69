/**
 * Analytic communication estimator. Collectives are timed on the interconnect.
 */

import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import { COMMUNICATION_PATTERNS, type CommunicationLayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import { COLLECTIVES, evaluateOp } from '../ops/index.js';
import { validateCommunication } from './validation.js';
import { summarizeOps } from './shared.js';

export const BYTES_PER_MB = 1e6;

export function estimateCommunication(
  layer: CommunicationLayerConfig,
  runtime: RuntimeShape,
  hardware: HardwareSpec
): LayerExecution {
  const config = layer.communication;
  validateCommunication(layer.name, config);

  const metrics = evaluateOp(COLLECTIVES[config.pattern], {
    payloadBytes: config.payloadMb * BYTES_PER_MB,
    worldSize: config.worldSize,
  });

  return summarizeOps({
    layer,
    runtime,
    hardware,
    ops: [metrics],
    shapeFeatures: {
      pattern: COMMUNICATION_PATTERNS.indexOf(config.pattern),
      payloadMb: config.payloadMb,
      worldSize: config.worldSize ?? 0,
    },
  });
}
