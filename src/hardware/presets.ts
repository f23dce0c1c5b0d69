/**
 * Built-in hardware profile catalog (data/hardware-presets.json)
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { HardwarePreset } from '../types/hardware.js';
import { ConfigurationError, toError } from '../errors/index.js';
import { describeIssues } from '../utils/zod.js';
import { HardwareSpecSchema } from './spec.js';

export const PRESETS_PATH = join(__dirname, '..', '..', 'data', 'hardware-presets.json');

const PresetCatalogSchema = z.array(
  z.object({
    id: z.string().min(1),
    description: z.string(),
    spec: HardwareSpecSchema,
  })
);

let catalog: readonly HardwarePreset[] | null = null;

function loadCatalog(): readonly HardwarePreset[] {
  if (catalog) {
    return catalog;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(PRESETS_PATH, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read hardware presets from ${PRESETS_PATH}`, undefined, toError(error));
  }

  const parsed = PresetCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid hardware preset catalog: ${describeIssues(parsed.error)}`);
  }

  catalog = Object.freeze(
    parsed.data.map((preset) => Object.freeze({ ...preset, spec: Object.freeze({ ...preset.spec }) }))
  );
  return catalog;
}

export function listHardwarePresets(): readonly HardwarePreset[] {
  return loadCatalog();
}

export function getHardwarePreset(id: string): HardwarePreset | undefined {
  const key = id.toLowerCase();
  return loadCatalog().find((preset) => preset.id === key);
}
