import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const BackendSchema = z.enum(['analytic', 'ml']);
export const OutputFormatSchema = z.enum(['table', 'csv', 'json']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('simple'),
  dir: z.string().default('./logs'),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
  /** Also write rotating log files under `dir` */
  file: z.boolean().default(false),
});

export const MCPConfigSchema = z.object({
  serverName: z.string().default('inference-latency-sim'),
  serverVersion: z.string().default('0.1.0'),
});

export const PlausibilityConfigSchema = z
  .object({
    minLatencyMs: z.number().finite().min(0).default(0),
    maxLatencyMs: z.number().positive().default(60_000),
    maxDeviationFactor: z.number().min(1).default(10),
  })
  .refine((value) => value.minLatencyMs <= value.maxLatencyMs, {
    message: 'minLatencyMs must not exceed maxLatencyMs',
  });

export const SimulatorConfigSchema = z.object({
  backend: BackendSchema.default('analytic'),
  /** Learned latency model (JSON); required by the ml backend */
  modelPath: z.string().optional(),
  plausibility: PlausibilityConfigSchema.default({}),
});

export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.default('table'),
  precision: z.number().int().min(0).max(12).default(4),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  mcp: MCPConfigSchema,
  simulator: SimulatorConfigSchema,
  output: OutputConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type BackendKind = z.infer<typeof BackendSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type PlausibilityConfig = z.infer<typeof PlausibilityConfigSchema>;
