/**
 * MCP Tool type definitions
 */

import { z } from 'zod';

/**
 * Tool descriptor interface
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export type ToolTextContent = { type: 'text'; text: string };

/**
 * Shape of an MCP CallToolResult carrying JSON text
 */
export type ToolCallResponse = { content: ToolTextContent[]; isError?: boolean };

const RuntimeArgs = {
  batchSize: z.number().int().min(1),
  seqLen: z.number().int().min(1),
  microBatch: z.number().int().min(1).optional(),
  tokensPerExpert: z.number().min(0).optional(),
};

const HardwareArg = z.union([z.string().min(1), z.record(z.unknown())]);

/**
 * Simulate scenario arguments schema: a scenario file or an inline document
 */
export const SimulateScenarioArgsSchema = z
  .object({
    scenarioPath: z.string().min(1).optional(),
    scenario: z.record(z.unknown()).optional(),
    ...RuntimeArgs,
    workflow: z.enum(['afd', 'large-ep']).optional().default('afd'),
  })
  .refine((args) => (args.scenarioPath === undefined) !== (args.scenario === undefined), {
    message: 'Provide exactly one of scenarioPath or scenario',
    path: ['scenarioPath'],
  });

export type SimulateScenarioArgs = z.infer<typeof SimulateScenarioArgsSchema>;

/**
 * Estimate layer arguments schema: one scenario-style layer entry
 */
export const EstimateLayerArgsSchema = z.object({
  layer: z.record(z.unknown()),
  hardware: HardwareArg,
  ...RuntimeArgs,
});

export type EstimateLayerArgs = z.infer<typeof EstimateLayerArgsSchema>;

export const ListHardwarePresetsArgsSchema = z.object({});

export type ListHardwarePresetsArgs = z.infer<typeof ListHardwarePresetsArgsSchema>;

export const ListFusedOpsArgsSchema = z.object({
  family: z.enum(['attention', 'ffn', 'moe', 'communication']).optional(),
});

export type ListFusedOpsArgs = z.infer<typeof ListFusedOpsArgsSchema>;

/**
 * Tool names enum
 */
export enum ToolName {
  SIMULATE_SCENARIO = 'simulate_scenario',
  ESTIMATE_LAYER = 'estimate_layer',
  LIST_HARDWARE_PRESETS = 'list_hardware_presets',
  LIST_FUSED_OPS = 'list_fused_ops',
}
