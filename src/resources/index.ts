/**
 * Resource registry and handlers
 * Central module for all MCP resources
 */

import type { Config } from '../config/schema.js';
import type { ResourceContent, ResourceDescriptor } from '../types/resources.js';
import { SystemResourceURIs } from '../types/resources.js';
import { FUSED_OPS } from '../ops/index.js';
import { LAYER_KINDS } from '../types/layers.js';
import { getHardwareResourceDescriptors, isHardwareResourceURI, readHardwareResource } from './hardware.js';

/**
 * Get all available MCP resources
 */
export async function listAllResources(): Promise<ResourceDescriptor[]> {
  const serverInfoResource: ResourceDescriptor = {
    uri: SystemResourceURIs.INFO,
    name: 'Server Information',
    description: 'Server name, version, estimator backend and supported layer types',
    mimeType: 'application/json',
  };

  return [serverInfoResource, ...getHardwareResourceDescriptors()];
}

/**
 * Read a resource by URI
 */
export async function readResource(uri: string, config: Config): Promise<ResourceContent[]> {
  if (uri === SystemResourceURIs.INFO) {
    return [
      {
        uri,
        mimeType: 'application/json',
        text: JSON.stringify(
          {
            name: config.mcp.serverName,
            version: config.mcp.serverVersion,
            description: 'Analytic latency estimates for transformer and mixture-of-experts layers',
            backend: config.simulator.backend,
            layerTypes: LAYER_KINDS,
            fusedOps: FUSED_OPS.length,
            capabilities: {
              resources: true,
              tools: true,
            },
          },
          null,
          2
        ),
      },
    ];
  }

  if (isHardwareResourceURI(uri)) {
    return readHardwareResource(uri);
  }

  throw new Error(`Unknown resource URI: ${uri}`);
}

/**
 * Check if a URI is a valid resource
 */
export function isValidResourceURI(uri: string): boolean {
  return uri === SystemResourceURIs.INFO || isHardwareResourceURI(uri);
}

export { getHardwareResourceDescriptors, readHardwareResource, presetURI } from './hardware.js';
