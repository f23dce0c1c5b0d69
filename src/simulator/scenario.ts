/**
 * Scenario loading
 *
 * A scenario file (YAML or JSON, snake_case keys) names a hardware profile and
 * an ordered list of layers:
 *
 *   name: dense_block
 *   hardware: h100-sxm            # preset id, relative file, or inline mapping
 *   layers:
 *     - type: attention_layer
 *       attn_config: { d_model: 4096, num_attention_heads: 32 }
 *     - type: ffn_layer
 *       config: ffn.yaml           # relative file or inline mapping
 *       overrides: { d_ff: 14336 }
 */

import { readFileSync } from 'fs';
import { basename, dirname, extname, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { HardwareSpec } from '../types/hardware.js';
import type {
  AttentionConfig,
  CommunicationConfig,
  FfnConfig,
  LayerConfig,
  LayerKind,
  MoeConfig,
} from '../types/layers.js';
import { DEFAULT_DTYPE_BITS } from '../ops/metrics.js';
import { getHardwarePreset, parseHardwareSpec } from '../hardware/index.js';
import { ConfigValidationError, ScenarioLoadError, toError } from '../errors/index.js';
import { camelizeKeys, isRecord } from '../utils/keys.js';
import { describeIssues } from '../utils/zod.js';

export interface Scenario {
  readonly name: string;
  readonly hardware: HardwareSpec;
  readonly layers: readonly LayerConfig[];
}

export interface ScenarioParseOptions {
  /** Directory that relative references resolve against */
  baseDir: string;
  /** Used when the document has no `name` */
  defaultName: string;
}

const LAYER_TYPE_ALIASES: ReadonlyMap<string, LayerKind> = new Map<string, LayerKind>([
  ['attention', 'attention'],
  ['attention_layer', 'attention'],
  ['ffn', 'ffn'],
  ['ffn_layer', 'ffn'],
  ['moe', 'moe'],
  ['moe_layer', 'moe'],
  ['communication', 'communication'],
  ['comm', 'communication'],
]);

const REFERENCE_EXTENSIONS = ['.yaml', '.yml', '.json'];

// Alternative (camelized) key names accepted in layer payloads
const ATTENTION_KEY_ALIASES = {
  numAttentionHeads: 'numHeads',
  numKeyValueHeads: 'numKvHeads',
} as const;

const FFN_KEY_ALIASES = {
  intermediateSize: 'dFf',
} as const;

const MOE_KEY_ALIASES = {
  moeIntermediateSize: 'expertIntermediateSize',
  dFf: 'expertIntermediateSize',
  nRoutedExperts: 'numExperts',
  numExpertsPerTok: 'expertsPerToken',
  topK: 'expertsPerToken',
  nGroup: 'numGroups',
  nSharedExperts: 'numSharedExperts',
} as const;

const ScenarioDocumentSchema = z.object({
  name: z.string().min(1).optional(),
  hardware: z.union([z.string().min(1), z.record(z.unknown())]),
  layers: z.array(z.record(z.unknown())).min(1, 'scenario must include at least one layer'),
});

const LayerEntrySchema = z
  .object({
    type: z.string().min(1),
    name: z.string().min(1).optional(),
    config: z.union([z.string().min(1), z.record(z.unknown())]).optional(),
    overrides: z.record(z.unknown()).optional(),
  })
  .passthrough();

const DEFAULT_D_MODEL = 768;

const dtypeBits = z.number().positive().default(DEFAULT_DTYPE_BITS);

const AttentionPayloadSchema = z.object({
  dModel: z.number().default(DEFAULT_D_MODEL),
  numHeads: z.number().default(8),
  headDim: z.number().optional(),
  numKvHeads: z.number().optional(),
  dtypeBits,
});

const FfnPayloadSchema = z.object({
  dModel: z.number(),
  dFf: z.number().default(3072),
  activation: z.enum(['relu', 'gelu', 'silu', 'swiglu', 'geglu']).default('gelu'),
  dtypeBits,
});

const MoePayloadSchema = z.object({
  dModel: z.number(),
  expertIntermediateSize: z.number().default(3072),
  numExperts: z.number().default(1),
  expertsPerToken: z.number().default(1),
  numGroups: z.number().default(1),
  numSharedExperts: z.number().default(0),
  expertParallel: z.number().default(1),
  gated: z.boolean().default(false),
  dtypeBits,
});

const CommunicationPayloadSchema = z.object({
  pattern: z.enum(['all_to_all', 'all_reduce', 'all_gather', 'reduce_scatter']).default('all_to_all'),
  payloadMb: z.number().default(1),
  worldSize: z.number().optional(),
});

/**
 * Read a YAML (or JSON) document that must be a mapping
 */
export function readDocument(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ScenarioLoadError(`Cannot read ${path}`, { path }, toError(error));
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ScenarioLoadError(`Cannot parse ${path}`, { path }, toError(error));
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ScenarioLoadError(`${path} must contain a mapping at the top level`, { path });
  }
  return document;
}

function resolveReference(baseDir: string, value: string | Record<string, unknown>): Record<string, unknown> {
  return typeof value === 'string' ? readDocument(resolve(baseDir, value)) : value;
}

function isFileReference(value: string): boolean {
  return REFERENCE_EXTENSIONS.includes(extname(value).toLowerCase());
}

function resolveHardware(baseDir: string, value: string | Record<string, unknown>): HardwareSpec {
  if (typeof value === 'string' && !isFileReference(value)) {
    const preset = getHardwarePreset(value);
    if (!preset) {
      throw new ConfigValidationError(`Unknown hardware preset '${value}'`, { hardware: value });
    }
    return preset.spec;
  }
  return parseHardwareSpec(camelizeKeys(resolveReference(baseDir, value)));
}

function normalizeKeys(raw: unknown, aliases: Readonly<Record<string, string>>): Record<string, unknown> {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigValidationError('layer payload must be a mapping');
  }
  const record = camelizeKeys(raw);
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (record[canonical] === undefined && record[alias] !== undefined) {
      record[canonical] = record[alias];
    }
  }
  return record;
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: Record<string, unknown>, where: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(`Invalid ${where}: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

function withLayerName<T>(layerName: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ConfigValidationError && !error.message.startsWith(`Layer '${layerName}'`)) {
      throw new ConfigValidationError(`Layer '${layerName}': ${error.message}`, error.context, error);
    }
    throw error;
  }
}

function buildLayer(index: number, kind: LayerKind, name: string, data: Record<string, unknown>): LayerConfig {
  const rawAttention = data['attn_config'];
  const attention: AttentionConfig | undefined =
    rawAttention === undefined
      ? undefined
      : parsePayload(AttentionPayloadSchema, normalizeKeys(rawAttention, ATTENTION_KEY_ALIASES), 'attn_config');
  const sharedDModel = attention?.dModel ?? DEFAULT_D_MODEL;

  switch (kind) {
    case 'attention': {
      const payload =
        attention ?? parsePayload(AttentionPayloadSchema, normalizeKeys(data, ATTENTION_KEY_ALIASES), 'attention');
      return { kind, name, index, attention: payload };
    }
    case 'ffn': {
      const raw = normalizeKeys(data['ffn_config'] ?? {}, FFN_KEY_ALIASES);
      const ffn: FfnConfig = parsePayload(FfnPayloadSchema, { dModel: sharedDModel, ...raw }, 'ffn_config');
      return { kind, name, index, attention, ffn };
    }
    case 'moe': {
      const raw = normalizeKeys(data['moe_config'] ?? {}, MOE_KEY_ALIASES);
      const moe: MoeConfig = parsePayload(MoePayloadSchema, { dModel: sharedDModel, ...raw }, 'moe_config');
      return { kind, name, index, attention, moe };
    }
    case 'communication': {
      const raw = normalizeKeys(data['comm_config'] ?? data, {});
      const communication: CommunicationConfig = parsePayload(CommunicationPayloadSchema, raw, 'comm_config');
      return { kind, name, index, attention, communication };
    }
  }
}

/**
 * Build a Scenario from an already-parsed document
 */
export function parseScenario(raw: unknown, options: ScenarioParseOptions): Scenario {
  const document = ScenarioDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new ConfigValidationError(`Invalid scenario: ${describeIssues(document.error)}`, {
      issues: document.error.issues,
    });
  }

  const { baseDir } = options;
  const hardware = resolveHardware(baseDir, document.data.hardware);

  const layers = document.data.layers.map((rawEntry, index): LayerConfig => {
    const entry = LayerEntrySchema.safeParse(rawEntry);
    if (!entry.success) {
      throw new ConfigValidationError(`Invalid layer entry #${index}: ${describeIssues(entry.error)}`, {
        index,
        issues: entry.error.issues,
      });
    }

    const kind = LAYER_TYPE_ALIASES.get(entry.data.type);
    if (!kind) {
      throw new ConfigValidationError(`Unsupported layer type '${entry.data.type}' in layer entry #${index}`, {
        index,
        type: entry.data.type,
      });
    }

    const { type: _type, config, overrides, ...inline } = entry.data;
    const base = config === undefined ? inline : resolveReference(baseDir, config);
    const merged: Record<string, unknown> = { ...base, ...overrides };
    const declaredName = merged['name'] ?? entry.data.name;
    const name = typeof declaredName === 'string' && declaredName.length > 0 ? declaredName : `${kind}_${index}`;

    return withLayerName(name, () => buildLayer(index, kind, name, merged));
  });

  return Object.freeze({
    name: document.data.name ?? options.defaultName,
    hardware,
    layers: Object.freeze(layers),
  });
}

/**
 * Load a scenario file; references resolve relative to its directory
 */
export function loadScenario(path: string): Scenario {
  const fullPath = resolve(path);
  return parseScenario(readDocument(fullPath), {
    baseDir: dirname(fullPath),
    defaultName: basename(fullPath, extname(fullPath)),
  });
}

export const SUPPORTED_LAYER_TYPES: readonly string[] = [...LAYER_TYPE_ALIASES.keys()];
