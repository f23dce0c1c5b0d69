/**
 * Tools registry and handlers
 * Central module for all MCP tools
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { EstimatorContext } from '../backends/context.js';
import {
  EstimateLayerArgsSchema,
  ListFusedOpsArgsSchema,
  ListHardwarePresetsArgsSchema,
  SimulateScenarioArgsSchema,
  ToolName,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import { simulateScenario } from './simulate-scenario.js';
import { estimateLayerTool } from './estimate-layer.js';
import { listFusedOpsTool, listHardwarePresetsTool } from './catalog.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';

const runtimeProperties = {
  batchSize: { type: 'integer', minimum: 1, description: 'Batch size' },
  seqLen: { type: 'integer', minimum: 1, description: 'Sequence length' },
  microBatch: { type: 'integer', minimum: 1, description: 'Optional: micro-batch size' },
  tokensPerExpert: {
    type: 'number',
    minimum: 0,
    description: 'Optional: measured tokens per expert for MoE layers',
  },
};

/**
 * Get all available MCP tools
 */
export function listAllTools(): ToolDescriptor[] {
  return [
    {
      name: ToolName.SIMULATE_SCENARIO,
      description:
        'Simulate a layer stack from a scenario file or inline scenario document. Returns per-layer compute, memory and dominant latency, totals and the bottleneck layer.',
      inputSchema: {
        type: 'object',
        properties: {
          scenarioPath: {
            type: 'string',
            description: 'Path to a YAML or JSON scenario file',
          },
          scenario: {
            type: 'object',
            description: 'Inline scenario document: { name?, hardware, layers: [...] } with snake_case keys',
          },
          ...runtimeProperties,
          workflow: {
            type: 'string',
            enum: ['afd', 'large-ep'],
            description: 'Report flavour (default: afd)',
          },
        },
        required: ['batchSize', 'seqLen'],
      },
    },
    {
      name: ToolName.ESTIMATE_LAYER,
      description:
        'Estimate one layer (attention, ffn, moe or communication) on a hardware preset or inline hardware profile.',
      inputSchema: {
        type: 'object',
        properties: {
          layer: {
            type: 'object',
            description: 'Scenario layer entry, e.g. { "type": "ffn", "ffn_config": { "d_model": 4096, "d_ff": 14336 } }',
          },
          hardware: {
            description: 'Hardware preset id or inline profile with snake_case keys',
          },
          ...runtimeProperties,
        },
        required: ['layer', 'hardware', 'batchSize', 'seqLen'],
      },
    },
    {
      name: ToolName.LIST_HARDWARE_PRESETS,
      description: 'List the built-in accelerator profiles usable as scenario hardware.',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
    {
      name: ToolName.LIST_FUSED_OPS,
      description: 'List the fused kernels the estimators are built from, optionally for one layer family.',
      inputSchema: {
        type: 'object',
        properties: {
          family: {
            type: 'string',
            enum: ['attention', 'ffn', 'moe', 'communication'],
            description: 'Optional: restrict to one family',
          },
        },
      },
    },
  ];
}

function withArgs<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  args: unknown,
  run: (parsed: T) => ToolCallResponse
): ToolCallResponse {
  const validation = validateToolArgs(schema, args ?? {});
  if (!validation.success) {
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(
            {
              error: 'Invalid tool arguments',
              details: formatValidationErrors(validation.errors),
            },
            null,
            2
          ),
        },
      ],
      isError: true,
    };
  }
  return run(validation.data);
}

/**
 * Call a tool by name
 */
export async function callTool(name: string, args: unknown, context: EstimatorContext): Promise<ToolCallResponse> {
  switch (name) {
    case ToolName.SIMULATE_SCENARIO:
      return withArgs(SimulateScenarioArgsSchema, args, (parsed) => simulateScenario(parsed, context));

    case ToolName.ESTIMATE_LAYER:
      return withArgs(EstimateLayerArgsSchema, args, (parsed) => estimateLayerTool(parsed, context));

    case ToolName.LIST_HARDWARE_PRESETS:
      return withArgs(ListHardwarePresetsArgsSchema, args, () => listHardwarePresetsTool());

    case ToolName.LIST_FUSED_OPS:
      return withArgs(ListFusedOpsArgsSchema, args, (parsed) => listFusedOpsTool(parsed));

    default:
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(
              {
                error: `Unknown tool: ${name}`,
                availableTools: listAllTools().map((t) => t.name),
              },
              null,
              2
            ),
          },
        ],
        isError: true,
      };
  }
}

/**
 * Check if a tool name is valid
 */
export function isValidToolName(name: string): boolean {
  return listAllTools().some((t) => t.name === name);
}

export { simulateScenario } from './simulate-scenario.js';
export { estimateLayerTool } from './estimate-layer.js';
export { listHardwarePresetsTool, listFusedOpsTool } from './catalog.js';
