/**
 * Fused-op registry
 */

import {
  allGather,
  allReduce,
  allToAll,
  attentionOutputProjection,
  attentionQkvProjection,
  attentionScores,
  attentionWeightedSum,
  ffnActivation,
  ffnDownProjection,
  ffnGateProjection,
  ffnUpProjection,
  moeCombine,
  moeDispatch,
  moeExpertMatmul,
  moeRouter,
  moeSharedExpert,
  moeTopkDispatch,
  reduceScatter,
  type FusedOpInfo,
  type OpFamily,
} from './fused-ops.js';

export const FUSED_OPS: readonly FusedOpInfo[] = [
  attentionQkvProjection,
  attentionScores,
  attentionWeightedSum,
  attentionOutputProjection,
  ffnUpProjection,
  ffnGateProjection,
  ffnActivation,
  ffnDownProjection,
  moeRouter,
  moeTopkDispatch,
  moeExpertMatmul,
  moeSharedExpert,
  moeDispatch,
  moeCombine,
  allToAll,
  allReduce,
  allGather,
  reduceScatter,
];

/**
 * Describe every known fused op, optionally restricted to one family
 */
export function listFusedOps(family?: OpFamily): FusedOpInfo[] {
  return FUSED_OPS.filter((op) => family === undefined || op.family === family).map((op) => ({
    name: op.name,
    family: op.family,
    channel: op.channel,
    notes: op.notes,
  }));
}

export function getFusedOp(name: string): FusedOpInfo | undefined {
  return FUSED_OPS.find((op) => op.name === name);
}

export * from './fused-ops.js';
export * from './metrics.js';
