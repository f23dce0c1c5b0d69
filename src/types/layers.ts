/**
 * Layer configuration type definitions
 *
 * A layer config is a tagged union on `kind`. Estimators switch on the tag,
 * so reading another variant's payload does not compile.
 */

export type LayerKind = 'attention' | 'ffn' | 'moe' | 'communication';

export const LAYER_KINDS: readonly LayerKind[] = ['attention', 'ffn', 'moe', 'communication'];

export interface AttentionConfig {
  readonly dModel: number;
  readonly numHeads: number;
  readonly headDim?: number;
  /** Grouped-query attention; defaults to numHeads */
  readonly numKvHeads?: number;
  readonly dtypeBits: number;
}

export type ActivationKind = 'relu' | 'gelu' | 'silu' | 'swiglu' | 'geglu';

export const ACTIVATION_KINDS: readonly ActivationKind[] = ['relu', 'gelu', 'silu', 'swiglu', 'geglu'];

export interface FfnConfig {
  readonly dModel: number;
  readonly dFf: number;
  readonly activation: ActivationKind;
  readonly dtypeBits: number;
}

export interface MoeConfig {
  readonly dModel: number;
  readonly expertIntermediateSize: number;
  readonly numExperts: number;
  readonly expertsPerToken: number;
  /** Group-limited routing: experts are scored per group before top-k */
  readonly numGroups: number;
  readonly numSharedExperts: number;
  /** Expert-parallel degree; above 1 adds dispatch/combine all-to-all */
  readonly expertParallel: number;
  /** Gated experts carry a third (gate) projection */
  readonly gated: boolean;
  readonly dtypeBits: number;
}

export type CommunicationPattern = 'all_to_all' | 'all_reduce' | 'all_gather' | 'reduce_scatter';

export const COMMUNICATION_PATTERNS: readonly CommunicationPattern[] = [
  'all_to_all',
  'all_reduce',
  'all_gather',
  'reduce_scatter',
];

export interface CommunicationConfig {
  readonly pattern: CommunicationPattern;
  readonly payloadMb: number;
  readonly worldSize?: number;
}

interface LayerBase {
  readonly name: string;
  readonly index: number;
  /** Shared attention sub-config, when the layer sits in an attention block */
  readonly attention?: AttentionConfig;
}

export interface AttentionLayerConfig extends LayerBase {
  readonly kind: 'attention';
  readonly attention: AttentionConfig;
}

export interface FfnLayerConfig extends LayerBase {
  readonly kind: 'ffn';
  readonly ffn: FfnConfig;
}

export interface MoeLayerConfig extends LayerBase {
  readonly kind: 'moe';
  readonly moe: MoeConfig;
}

export interface CommunicationLayerConfig extends LayerBase {
  readonly kind: 'communication';
  readonly communication: CommunicationConfig;
}

export type LayerConfig =
  | AttentionLayerConfig
  | FfnLayerConfig
  | MoeLayerConfig
  | CommunicationLayerConfig;
