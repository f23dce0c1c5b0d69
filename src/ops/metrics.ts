/**
 * FLOP and tensor-size helpers shared by the fused-op formulas
 */

import { FormulaDomainError } from '../errors/index.js';

export const DEFAULT_DTYPE_BITS = 16;

/**
 * FLOPs of a dense (m x k) @ (k x n) matmul, 2 per multiply-add
 */
export function matmulFlops(m: number, n: number, k: number): number {
  return 2 * m * n * k;
}

export function tensorElements(shape: readonly number[]): number {
  let total = 1;
  for (const dim of shape) {
    total *= dim;
  }
  return total;
}

export function tensorBytes(shape: readonly number[], dtypeBits: number = DEFAULT_DTYPE_BITS): number {
  return (tensorElements(shape) * dtypeBits) / 8;
}

/**
 * Reject dimensions a formula is undefined for (negative, NaN, infinite)
 */
export function assertDimension(opName: string, field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new FormulaDomainError(`${opName}: ${field} must be a finite, non-negative number (got ${value})`, {
      op: opName,
      field,
      value,
    });
  }
}
