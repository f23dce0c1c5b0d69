/**
 * Learned latency regressors
 *
 * A linear model file holds, per layer type, one intercept + feature weights
 * per predicted time:
 *
 *   { "version": 1, "layers": { "ffn": { "computeTimeMs": { "intercept": 0, "weights": { "flops": 3e-12 } },
 *                                        "memoryTimeMs": { ... } } } }
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { LAYER_KINDS, type LayerKind } from '../types/layers.js';
import { BackendUnavailableError, toError } from '../errors/index.js';
import { describeIssues } from '../utils/zod.js';

export interface LatencyPrediction {
  computeTimeMs: number;
  memoryTimeMs: number;
}

export interface LatencyRegressor {
  predict(layerType: LayerKind, features: Readonly<Record<string, number>>): LatencyPrediction;
}

const LinearTermSchema = z.object({
  intercept: z.number().finite(),
  weights: z.record(z.number().finite()),
});

const LayerModelSchema = z.object({
  computeTimeMs: LinearTermSchema,
  memoryTimeMs: LinearTermSchema,
});

export const LinearModelSchema = z.object({
  version: z.literal(1),
  description: z.string().optional(),
  layers: z.record(z.enum(['attention', 'ffn', 'moe', 'communication']), LayerModelSchema),
});

export type LinearModel = z.infer<typeof LinearModelSchema>;
type LinearTerm = z.infer<typeof LinearTermSchema>;

export class LinearLatencyRegressor implements LatencyRegressor {
  constructor(private readonly model: LinearModel) {}

  static fromJSON(raw: unknown): LinearLatencyRegressor {
    const parsed = LinearModelSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BackendUnavailableError(`Invalid latency model: ${describeIssues(parsed.error)}`);
    }
    return new LinearLatencyRegressor(parsed.data);
  }

  static fromFile(path: string): LinearLatencyRegressor {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new BackendUnavailableError(`Cannot read latency model ${path}`, { path }, toError(error));
    }
    return LinearLatencyRegressor.fromJSON(raw);
  }

  /** Layer types the model has coefficients for */
  get layerTypes(): LayerKind[] {
    return LAYER_KINDS.filter((kind) => this.model.layers[kind] !== undefined);
  }

  predict(layerType: LayerKind, features: Readonly<Record<string, number>>): LatencyPrediction {
    const layer = this.model.layers[layerType];
    if (!layer) {
      throw new BackendUnavailableError(`Latency model has no coefficients for ${layerType} layers`, { layerType });
    }
    return {
      computeTimeMs: evaluate(layer.computeTimeMs, features),
      memoryTimeMs: evaluate(layer.memoryTimeMs, features),
    };
  }
}

function evaluate(term: LinearTerm, features: Readonly<Record<string, number>>): number {
  let total = term.intercept;
  for (const [name, weight] of Object.entries(term.weights)) {
    const value = features[name];
    if (value === undefined) {
      throw new BackendUnavailableError(`Latency model expects feature '${name}'`, { feature: name });
    }
    total += weight * value;
  }
  return total;
}
