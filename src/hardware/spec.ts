/**
 * Hardware profile parsing
 *
 * Non-positive compute, bandwidth or capacity figures are rejected here,
 * never clamped later.
 */

import { z } from 'zod';
import type { HardwareSpec } from '../types/hardware.js';
import { ConfigValidationError } from '../errors/index.js';
import { describeIssues } from '../utils/zod.js';

export const HardwareSpecSchema = z.object({
  name: z.string().min(1),
  peakTflops: z.number().finite().positive(),
  memoryBandwidthGbps: z.number().finite().positive(),
  hbmGb: z.number().finite().positive(),
  interconnectGbps: z.number().finite().min(0),
  maxConcurrency: z.number().int().min(1).default(1),
  overlapEfficiency: z.number().min(0).max(1).default(1),
});

export type HardwareSpecInput = z.input<typeof HardwareSpecSchema>;

/**
 * Validate and freeze a hardware profile
 */
export function parseHardwareSpec(raw: unknown): HardwareSpec {
  const result = HardwareSpecSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(`Invalid hardware spec: ${describeIssues(result.error)}`, {
      issues: result.error.issues,
    });
  }
  return Object.freeze({ ...result.data });
}
