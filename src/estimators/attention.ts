/**
 * Analytic attention estimator
 */

import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { AttentionConfig, AttentionLayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import {
  attentionOutputProjection,
  attentionQkvProjection,
  attentionScores,
  attentionWeightedSum,
  evaluateOp,
  type AttentionShape,
} from '../ops/index.js';
import { resolveAttention } from './validation.js';
import { summarizeOps } from './shared.js';

export function attentionShape(layerName: string, config: AttentionConfig, runtime: RuntimeShape): AttentionShape {
  const { numKvHeads, headDim } = resolveAttention(layerName, config);
  return {
    batch: runtime.batchSize,
    seq: runtime.seqLen,
    dModel: config.dModel,
    numHeads: config.numHeads,
    numKvHeads,
    headDim,
    dtypeBits: config.dtypeBits,
  };
}

export function estimateAttention(
  layer: AttentionLayerConfig,
  runtime: RuntimeShape,
  hardware: HardwareSpec
): LayerExecution {
  const shape = attentionShape(layer.name, layer.attention, runtime);
  const ops = [attentionQkvProjection, attentionScores, attentionWeightedSum, attentionOutputProjection].map((op) =>
    evaluateOp(op, shape)
  );

  return summarizeOps({
    layer,
    runtime,
    hardware,
    ops,
    shapeFeatures: {
      dModel: shape.dModel,
      numHeads: shape.numHeads,
      numKvHeads: shape.numKvHeads,
      headDim: shape.headDim,
      dtypeBits: shape.dtypeBits,
    },
  });
}
