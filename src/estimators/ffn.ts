/**
 * Analytic FFN estimator: up (+ gate) projection, activation, down projection
 */

import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { FfnLayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import {
  ACTIVATION_FLOPS,
  evaluateOp,
  ffnActivation,
  ffnDownProjection,
  ffnGateProjection,
  ffnUpProjection,
  isGatedActivation,
  type FfnShape,
} from '../ops/index.js';
import { validateFfn } from './validation.js';
import { summarizeOps } from './shared.js';

export function estimateFfn(layer: FfnLayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution {
  const config = layer.ffn;
  validateFfn(layer.name, config);

  const shape: FfnShape = {
    batch: runtime.batchSize,
    seq: runtime.seqLen,
    dModel: config.dModel,
    dFf: config.dFf,
    activation: config.activation,
    dtypeBits: config.dtypeBits,
  };
  const gated = isGatedActivation(config.activation);
  const kernels = gated
    ? [ffnUpProjection, ffnGateProjection, ffnActivation, ffnDownProjection]
    : [ffnUpProjection, ffnActivation, ffnDownProjection];

  return summarizeOps({
    layer,
    runtime,
    hardware,
    ops: kernels.map((op) => evaluateOp(op, shape)),
    shapeFeatures: {
      dModel: config.dModel,
      dFf: config.dFf,
      gated: gated ? 1 : 0,
      activationFlops: ACTIVATION_FLOPS[config.activation],
      dtypeBits: config.dtypeBits,
    },
  });
}
