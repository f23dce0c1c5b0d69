/**
 * MCP Resource type definitions
 */

export interface ResourceDescriptor {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}

/**
 * Hardware resource URIs
 */
export const HardwareResourceURIs = {
  PRESETS: 'infersim://hardware/presets',
  PRESET_PREFIX: 'infersim://hardware/presets/',
} as const;

/**
 * System resource URIs
 */
export const SystemResourceURIs = {
  INFO: 'infersim://server/info',
} as const;

export type SystemResourceURI = (typeof SystemResourceURIs)[keyof typeof SystemResourceURIs];
