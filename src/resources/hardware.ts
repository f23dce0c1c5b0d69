/**
 * Hardware preset resources
 */

import { getHardwarePreset, listHardwarePresets } from '../hardware/index.js';
import type { ResourceContent, ResourceDescriptor } from '../types/resources.js';
import { HardwareResourceURIs } from '../types/resources.js';

export function presetURI(id: string): string {
  return `${HardwareResourceURIs.PRESET_PREFIX}${id}`;
}

/**
 * The catalog resource plus one resource per preset
 */
export function getHardwareResourceDescriptors(): ResourceDescriptor[] {
  return [
    {
      uri: HardwareResourceURIs.PRESETS,
      name: 'Hardware Presets',
      description: 'Built-in accelerator profiles (peak TFLOPS, memory and interconnect bandwidth)',
      mimeType: 'application/json',
    },
    ...listHardwarePresets().map((preset) => ({
      uri: presetURI(preset.id),
      name: preset.spec.name,
      description: preset.description,
      mimeType: 'application/json',
    })),
  ];
}

export function isHardwareResourceURI(uri: string): boolean {
  return uri === HardwareResourceURIs.PRESETS || uri.startsWith(HardwareResourceURIs.PRESET_PREFIX);
}

export function readHardwareResource(uri: string): ResourceContent[] {
  if (uri === HardwareResourceURIs.PRESETS) {
    return [{ uri, mimeType: 'application/json', text: JSON.stringify(listHardwarePresets(), null, 2) }];
  }

  const id = uri.slice(HardwareResourceURIs.PRESET_PREFIX.length);
  const preset = getHardwarePreset(id);
  if (!preset) {
    throw new Error(`Unknown hardware preset: ${id}`);
  }
  return [{ uri, mimeType: 'application/json', text: JSON.stringify(preset, null, 2) }];
}
