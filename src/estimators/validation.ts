/**
 * Layer and runtime validation run before any fused op executes
 */

import { z } from 'zod';
import type { RuntimeShape } from '../types/runtime.js';
import {
  ACTIVATION_KINDS,
  COMMUNICATION_PATTERNS,
  type AttentionConfig,
  type CommunicationConfig,
  type FfnConfig,
  type MoeConfig,
} from '../types/layers.js';
import { ConfigValidationError } from '../errors/index.js';
import { describeIssues } from '../utils/zod.js';

export const RuntimeShapeSchema = z.object({
  batchSize: z.number().int().min(1),
  seqLen: z.number().int().min(1),
  microBatch: z.number().int().min(1).optional(),
  tokensPerExpert: z.number().finite().min(0).optional(),
});

/**
 * Validate a runtime shape and return a frozen copy
 */
export function parseRuntimeShape(raw: unknown): RuntimeShape {
  const result = RuntimeShapeSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(`Invalid runtime shape: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return Object.freeze({ ...result.data });
}

function fail(layerName: string, message: string, context: Record<string, unknown> = {}): never {
  throw new ConfigValidationError(`Layer '${layerName}': ${message}`, { layerName, ...context });
}

function requirePositive(layerName: string, field: string, value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fail(layerName, `${field} must be a positive number (got ${String(value)})`, { field });
  }
  return value;
}

function requireCount(layerName: string, field: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    return fail(layerName, `${field} must be an integer >= ${min} (got ${value})`, { field });
  }
  return value;
}

export interface ResolvedAttention {
  numKvHeads: number;
  headDim: number;
}

/**
 * Check an attention config and resolve its derived head dimensions
 */
export function resolveAttention(layerName: string, config: AttentionConfig | undefined): ResolvedAttention {
  if (!config) {
    return fail(layerName, 'attention config is required');
  }
  const dModel = requirePositive(layerName, 'dModel', config.dModel);
  const numHeads = requireCount(layerName, 'numHeads', config.numHeads, 1);
  requirePositive(layerName, 'dtypeBits', config.dtypeBits);

  let headDim: number;
  if (config.headDim !== undefined) {
    headDim = requireCount(layerName, 'headDim', config.headDim, 1);
  } else if (dModel % numHeads === 0) {
    headDim = dModel / numHeads;
  } else {
    return fail(layerName, `headDim is required when dModel (${dModel}) is not divisible by numHeads (${numHeads})`, {
      field: 'headDim',
    });
  }

  const numKvHeads = requireCount(layerName, 'numKvHeads', config.numKvHeads ?? numHeads, 1);
  if (numHeads % numKvHeads !== 0) {
    return fail(layerName, `numHeads (${numHeads}) must be a multiple of numKvHeads (${numKvHeads})`, {
      field: 'numKvHeads',
    });
  }

  return { numKvHeads, headDim };
}

export function validateFfn(layerName: string, config: FfnConfig): void {
  requirePositive(layerName, 'dModel', config.dModel);
  requirePositive(layerName, 'dFf', config.dFf);
  requirePositive(layerName, 'dtypeBits', config.dtypeBits);
  if (!ACTIVATION_KINDS.includes(config.activation)) {
    fail(layerName, `unknown activation '${String(config.activation)}'`, { field: 'activation' });
  }
}

export function validateMoe(layerName: string, config: MoeConfig): void {
  requirePositive(layerName, 'dModel', config.dModel);
  requirePositive(layerName, 'expertIntermediateSize', config.expertIntermediateSize);
  requirePositive(layerName, 'dtypeBits', config.dtypeBits);
  requireCount(layerName, 'numExperts', config.numExperts, 1);
  requireCount(layerName, 'expertsPerToken', config.expertsPerToken, 0);
  requireCount(layerName, 'numGroups', config.numGroups, 1);
  requireCount(layerName, 'numSharedExperts', config.numSharedExperts, 0);
  requireCount(layerName, 'expertParallel', config.expertParallel, 1);

  if (config.expertsPerToken > config.numExperts) {
    fail(
      layerName,
      `expertsPerToken (${config.expertsPerToken}) exceeds numExperts (${config.numExperts})`,
      { field: 'expertsPerToken' }
    );
  }
}

export function validateCommunication(layerName: string, config: CommunicationConfig): void {
  if (!COMMUNICATION_PATTERNS.includes(config.pattern)) {
    fail(layerName, `unknown communication pattern '${String(config.pattern)}'`, { field: 'pattern' });
  }
  if (!Number.isFinite(config.payloadMb) || config.payloadMb < 0) {
    fail(layerName, `payloadMb must be a non-negative number (got ${config.payloadMb})`, { field: 'payloadMb' });
  }
  if (config.worldSize !== undefined) {
    requireCount(layerName, 'worldSize', config.worldSize, 1);
  }
}
