/**
 * Analytic MoE estimator
 *
 * router + top-k selection + routed experts, plus shared experts and the
 * expert-parallel dispatch/combine all-to-all when configured.
 */

import type { LayerExecution } from '../types/execution.js';
import type { HardwareSpec } from '../types/hardware.js';
import type { MoeConfig, MoeLayerConfig } from '../types/layers.js';
import type { RuntimeShape } from '../types/runtime.js';
import {
  evaluateOp,
  moeCombine,
  moeDispatch,
  moeExpertMatmul,
  moeRouter,
  moeSharedExpert,
  moeTopkDispatch,
  type FusedOp,
  type MoeShape,
} from '../ops/index.js';
import { validateMoe } from './validation.js';
import { summarizeOps } from './shared.js';

/**
 * Token slots handed to experts. A measured per-expert load replaces the
 * uniform tokens x experts-per-token average; nothing is routed when k = 0.
 */
export function routedTokens(config: MoeConfig, runtime: RuntimeShape): number {
  if (config.expertsPerToken === 0) {
    return 0;
  }
  if (runtime.tokensPerExpert !== undefined) {
    return runtime.tokensPerExpert * config.numExperts;
  }
  return runtime.batchSize * runtime.seqLen * config.expertsPerToken;
}

export function estimateMoe(layer: MoeLayerConfig, runtime: RuntimeShape, hardware: HardwareSpec): LayerExecution {
  const config = layer.moe;
  validateMoe(layer.name, config);

  const shape: MoeShape = {
    batch: runtime.batchSize,
    seq: runtime.seqLen,
    dModel: config.dModel,
    expertHidden: config.expertIntermediateSize,
    numExperts: config.numExperts,
    topK: config.expertsPerToken,
    numGroups: config.numGroups,
    numSharedExperts: config.numSharedExperts,
    routedTokens: routedTokens(config, runtime),
    expertParallel: config.expertParallel,
    gated: config.gated,
    dtypeBits: config.dtypeBits,
  };

  const kernels: FusedOp<MoeShape>[] = [moeRouter, moeTopkDispatch, moeExpertMatmul];
  if (config.numSharedExperts > 0) {
    kernels.push(moeSharedExpert);
  }
  if (config.expertParallel > 1) {
    kernels.push(moeDispatch, moeCombine);
  }

  return summarizeOps({
    layer,
    runtime,
    hardware,
    ops: kernels.map((op) => evaluateOp(op, shape)),
    shapeFeatures: {
      dModel: config.dModel,
      expertIntermediateSize: config.expertIntermediateSize,
      numExperts: config.numExperts,
      expertsPerToken: config.expertsPerToken,
      numGroups: config.numGroups,
      numSharedExperts: config.numSharedExperts,
      expertParallel: config.expertParallel,
      gated: config.gated ? 1 : 0,
      routedTokens: shape.routedTokens,
      dtypeBits: config.dtypeBits,
    },
  });
}
