/**
 * Fused-op library
 *
 * Each op maps a shape to FLOPs and to bytes read (weights + activations in)
 * and bytes written (activations out). Formulas are closed-form and carry
 * no hardware knowledge.
 */

import type { FusionMetrics } from '../types/execution.js';
import type { TransferChannel } from '../types/hardware.js';
import type { ActivationKind, CommunicationPattern } from '../types/layers.js';
import { FormulaDomainError } from '../errors/index.js';
import { assertDimension, matmulFlops, tensorBytes } from './metrics.js';

export type OpFamily = 'attention' | 'ffn' | 'moe' | 'communication';

type ShapeValue = number | string | boolean | undefined;

export type OpShape = Readonly<Record<string, ShapeValue>>;

export interface ByteCounts {
  read: number;
  written: number;
}

export interface FusedOp<S extends OpShape> {
  readonly name: string;
  readonly family: OpFamily;
  readonly channel: TransferChannel;
  readonly notes?: string;
  flops(shape: S): number;
  bytes(shape: S): ByteCounts;
  /** Extra domain checks beyond non-negative dimensions */
  validate?(shape: S): void;
}

export type FusedOpInfo = Pick<FusedOp<OpShape>, 'name' | 'family' | 'channel' | 'notes'>;

/**
 * Evaluate an op after checking every numeric dimension of its shape
 */
export function evaluateOp<S extends OpShape>(op: FusedOp<S>, shape: S): FusionMetrics {
  for (const [field, value] of Object.entries(shape)) {
    if (typeof value === 'number') {
      assertDimension(op.name, field, value);
    }
  }
  op.validate?.(shape);

  const { read, written } = op.bytes(shape);
  return {
    name: op.name,
    flops: op.flops(shape),
    bytesRead: read,
    bytesWritten: written,
    channel: op.channel,
  };
}

// ---------------------------------------------------------------------------
// Attention family
// ---------------------------------------------------------------------------

export type AttentionShape = {
  readonly batch: number;
  readonly seq: number;
  readonly dModel: number;
  readonly numHeads: number;
  readonly numKvHeads: number;
  readonly headDim: number;
  readonly dtypeBits: number;
};

/** max, subtract, exp, sum, divide */
export const SOFTMAX_FLOPS_PER_ELEMENT = 5;

function qkvWidth(shape: AttentionShape): number {
  return shape.numHeads * shape.headDim + 2 * shape.numKvHeads * shape.headDim;
}

export const attentionQkvProjection: FusedOp<AttentionShape> = {
  name: 'attention_qkv_proj',
  family: 'attention',
  channel: 'memory',
  notes: 'Fused Q, K and V projections; K/V shrink with grouped-query heads',
  flops: (s) => matmulFlops(s.batch * s.seq, qkvWidth(s), s.dModel),
  bytes: (s) => ({
    read: tensorBytes([s.batch, s.seq, s.dModel], s.dtypeBits) + tensorBytes([s.dModel, qkvWidth(s)], s.dtypeBits),
    written: tensorBytes([s.batch, s.seq, qkvWidth(s)], s.dtypeBits),
  }),
};

export const attentionScores: FusedOp<AttentionShape> = {
  name: 'attention_scores',
  family: 'attention',
  channel: 'memory',
  notes: 'Q @ K^T per head followed by softmax',
  flops: (s) =>
    matmulFlops(s.seq, s.seq, s.headDim) * s.batch * s.numHeads +
    SOFTMAX_FLOPS_PER_ELEMENT * s.batch * s.numHeads * s.seq * s.seq,
  bytes: (s) => ({
    read:
      tensorBytes([s.batch, s.numHeads, s.seq, s.headDim], s.dtypeBits) +
      tensorBytes([s.batch, s.numKvHeads, s.seq, s.headDim], s.dtypeBits),
    written: tensorBytes([s.batch, s.numHeads, s.seq, s.seq], s.dtypeBits),
  }),
};

export const attentionWeightedSum: FusedOp<AttentionShape> = {
  name: 'attention_weighted_sum',
  family: 'attention',
  channel: 'memory',
  notes: 'Softmax probabilities @ V per head',
  flops: (s) => matmulFlops(s.seq, s.headDim, s.seq) * s.batch * s.numHeads,
  bytes: (s) => ({
    read:
      tensorBytes([s.batch, s.numHeads, s.seq, s.seq], s.dtypeBits) +
      tensorBytes([s.batch, s.numKvHeads, s.seq, s.headDim], s.dtypeBits),
    written: tensorBytes([s.batch, s.seq, s.numHeads * s.headDim], s.dtypeBits),
  }),
};

export const attentionOutputProjection: FusedOp<AttentionShape> = {
  name: 'attention_output_proj',
  family: 'attention',
  channel: 'memory',
  flops: (s) => matmulFlops(s.batch * s.seq, s.dModel, s.numHeads * s.headDim),
  bytes: (s) => ({
    read:
      tensorBytes([s.batch, s.seq, s.numHeads * s.headDim], s.dtypeBits) +
      tensorBytes([s.numHeads * s.headDim, s.dModel], s.dtypeBits),
    written: tensorBytes([s.batch, s.seq, s.dModel], s.dtypeBits),
  }),
};

// ---------------------------------------------------------------------------
// FFN family
// ---------------------------------------------------------------------------

export type FfnShape = {
  readonly batch: number;
  readonly seq: number;
  readonly dModel: number;
  readonly dFf: number;
  readonly activation: ActivationKind;
  readonly dtypeBits: number;
};

/**
 * Elementwise FLOPs per hidden unit. Gated variants include the gating multiply.
 */
export const ACTIVATION_FLOPS: Readonly<Record<ActivationKind, number>> = {
  relu: 1,
  silu: 4,
  gelu: 8,
  swiglu: 5,
  geglu: 9,
};

export function isGatedActivation(activation: ActivationKind): boolean {
  return activation === 'swiglu' || activation === 'geglu';
}

const upProjectionFlops = (s: FfnShape): number => matmulFlops(s.batch * s.seq, s.dFf, s.dModel);

const upProjectionBytes = (s: FfnShape): ByteCounts => ({
  read: tensorBytes([s.batch, s.seq, s.dModel], s.dtypeBits) + tensorBytes([s.dModel, s.dFf], s.dtypeBits),
  written: tensorBytes([s.batch, s.seq, s.dFf], s.dtypeBits),
});

export const ffnUpProjection: FusedOp<FfnShape> = {
  name: 'ffn_up_proj',
  family: 'ffn',
  channel: 'memory',
  flops: upProjectionFlops,
  bytes: upProjectionBytes,
};

export const ffnGateProjection: FusedOp<FfnShape> = {
  name: 'ffn_gate_proj',
  family: 'ffn',
  channel: 'memory',
  notes: 'Only present for gated activations (swiglu, geglu)',
  flops: upProjectionFlops,
  bytes: upProjectionBytes,
};

export const ffnActivation: FusedOp<FfnShape> = {
  name: 'ffn_activation',
  family: 'ffn',
  channel: 'memory',
  notes: 'Elementwise activation; gated variants read both projections',
  flops: (s) => s.batch * s.seq * s.dFf * ACTIVATION_FLOPS[s.activation],
  bytes: (s) => ({
    read: tensorBytes([s.batch, s.seq, s.dFf], s.dtypeBits) * (isGatedActivation(s.activation) ? 2 : 1),
    written: tensorBytes([s.batch, s.seq, s.dFf], s.dtypeBits),
  }),
};

export const ffnDownProjection: FusedOp<FfnShape> = {
  name: 'ffn_down_proj',
  family: 'ffn',
  channel: 'memory',
  flops: (s) => matmulFlops(s.batch * s.seq, s.dModel, s.dFf),
  bytes: (s) => ({
    read: tensorBytes([s.batch, s.seq, s.dFf], s.dtypeBits) + tensorBytes([s.dFf, s.dModel], s.dtypeBits),
    written: tensorBytes([s.batch, s.seq, s.dModel], s.dtypeBits),
  }),
};

// ---------------------------------------------------------------------------
// MoE family
// ---------------------------------------------------------------------------

export type MoeShape = {
  readonly batch: number;
  readonly seq: number;
  readonly dModel: number;
  readonly expertHidden: number;
  readonly numExperts: number;
  readonly topK: number;
  readonly numGroups: number;
  readonly numSharedExperts: number;
  /** Token slots routed to experts (tokens x experts-per-token, or measured load) */
  readonly routedTokens: number;
  readonly expertParallel: number;
  readonly gated: boolean;
  readonly dtypeBits: number;
};

/** int32 expert indices written next to the top-k scores */
export const EXPERT_INDEX_BYTES = 4;

function validateRouting(opName: string): (s: MoeShape) => void {
  return (s) => {
    if (s.topK > s.numExperts) {
      throw new FormulaDomainError(
        `${opName}: cannot select ${s.topK} experts per token out of ${s.numExperts}`,
        { op: opName, topK: s.topK, numExperts: s.numExperts }
      );
    }
  };
}

function expertFfn(tokens: number, activeExperts: number, s: MoeShape): { flops: number; bytes: ByteCounts } {
  const matrices = s.gated ? 3 : 2;
  return {
    flops: matmulFlops(tokens, s.expertHidden, s.dModel) * matrices + tokens * s.expertHidden,
    bytes: {
      read:
        tensorBytes([tokens, s.dModel], s.dtypeBits) +
        activeExperts * matrices * tensorBytes([s.dModel, s.expertHidden], s.dtypeBits),
      written: tensorBytes([tokens, s.dModel], s.dtypeBits),
    },
  };
}

/**
 * Per-device all-to-all traffic for the routed activations
 */
function expertAllToAll(s: MoeShape): ByteCounts {
  const payload = tensorBytes([s.routedTokens, s.dModel], s.dtypeBits);
  const moved = payload * collectiveFactor('all_to_all', s.expertParallel);
  return { read: moved, written: moved };
}

export const moeRouter: FusedOp<MoeShape> = {
  name: 'moe_router',
  family: 'moe',
  channel: 'memory',
  notes: 'Gating matmul producing one logit per expert; skipped when nothing is routed',
  validate: validateRouting('moe_router'),
  flops: (s) => (s.topK === 0 ? 0 : matmulFlops(s.batch * s.seq, s.numExperts, s.dModel)),
  bytes: (s) =>
    s.topK === 0
      ? { read: 0, written: 0 }
      : {
          read: tensorBytes([s.batch * s.seq, s.dModel], s.dtypeBits) + tensorBytes([s.dModel, s.numExperts], s.dtypeBits),
          written: tensorBytes([s.batch * s.seq, s.numExperts], s.dtypeBits),
        },
};

export const moeTopkDispatch: FusedOp<MoeShape> = {
  name: 'moe_topk_dispatch',
  family: 'moe',
  channel: 'memory',
  notes: 'Top-k expert selection over the router logits, with group scoring when grouped',
  validate: validateRouting('moe_topk_dispatch'),
  flops: (s) => {
    if (s.topK === 0) {
      return 0;
    }
    const tokens = s.batch * s.seq;
    const groupScoring = s.numGroups > 1 ? tokens * s.numGroups : 0;
    return tokens * (s.numExperts + s.topK) + groupScoring;
  },
  bytes: (s) =>
    s.topK === 0
      ? { read: 0, written: 0 }
      : {
          read: tensorBytes([s.batch * s.seq, s.numExperts], s.dtypeBits),
          written: s.batch * s.seq * s.topK * (s.dtypeBits / 8 + EXPERT_INDEX_BYTES),
        },
};

export const moeExpertMatmul: FusedOp<MoeShape> = {
  name: 'moe_expert_matmul',
  family: 'moe',
  channel: 'memory',
  notes: 'Routed expert FFNs; weights are read once per expert that receives tokens',
  validate: validateRouting('moe_expert_matmul'),
  flops: (s) => expertFfn(s.routedTokens, Math.min(s.numExperts, s.routedTokens), s).flops,
  bytes: (s) => expertFfn(s.routedTokens, Math.min(s.numExperts, s.routedTokens), s).bytes,
};

export const moeSharedExpert: FusedOp<MoeShape> = {
  name: 'moe_shared_expert',
  family: 'moe',
  channel: 'memory',
  notes: 'Always-on shared experts that see every token',
  flops: (s) => expertFfn(s.batch * s.seq * s.numSharedExperts, s.numSharedExperts, s).flops,
  bytes: (s) => expertFfn(s.batch * s.seq * s.numSharedExperts, s.numSharedExperts, s).bytes,
};

export const moeDispatch: FusedOp<MoeShape> = {
  name: 'moe_dispatch',
  family: 'moe',
  channel: 'interconnect',
  notes: 'All-to-all sending routed tokens to expert-parallel ranks',
  flops: () => 0,
  bytes: expertAllToAll,
};

export const moeCombine: FusedOp<MoeShape> = {
  name: 'moe_combine',
  family: 'moe',
  channel: 'interconnect',
  notes: 'All-to-all returning expert outputs to their source ranks',
  flops: () => 0,
  bytes: expertAllToAll,
};

// ---------------------------------------------------------------------------
// Communication family
// ---------------------------------------------------------------------------

export type CollectiveShape = {
  readonly payloadBytes: number;
  readonly worldSize?: number;
};

/**
 * Fraction of the payload each device sends (and receives) under a ring
 * schedule. Without a world size the whole payload moves once each way.
 */
export function collectiveFactor(pattern: CommunicationPattern, worldSize?: number): number {
  if (worldSize === undefined) {
    return 1;
  }
  if (worldSize <= 1) {
    return 0;
  }
  const ringShare = (worldSize - 1) / worldSize;
  return pattern === 'all_reduce' ? 2 * ringShare : ringShare;
}

function collective(pattern: CommunicationPattern, notes: string): FusedOp<CollectiveShape> {
  return {
    name: pattern,
    family: 'communication',
    channel: 'interconnect',
    notes,
    flops: () => 0,
    bytes: (s) => {
      const moved = s.payloadBytes * collectiveFactor(pattern, s.worldSize);
      return { read: moved, written: moved };
    },
  };
}

export const allToAll = collective('all_to_all', 'Each rank exchanges a shard with every other rank');
export const allReduce = collective('all_reduce', 'Ring reduce-scatter followed by all-gather');
export const allGather = collective('all_gather', 'Each rank collects every other rank\'s shard');
export const reduceScatter = collective('reduce_scatter', 'Each rank ends with one reduced shard');

export const COLLECTIVES: Readonly<Record<CommunicationPattern, FusedOp<CollectiveShape>>> = {
  all_to_all: allToAll,
  all_reduce: allReduce,
  all_gather: allGather,
  reduce_scatter: reduceScatter,
};
