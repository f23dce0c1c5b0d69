import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  logging: {
    level: 'info',
    format: 'simple',
    dir: './logs',
    maxFiles: 10,
    maxSize: '10m',
    file: false,
  },
  mcp: {
    serverName: 'inference-latency-sim',
    serverVersion: '0.1.0',
  },
  simulator: {
    backend: 'analytic',
    modelPath: undefined,
    plausibility: {
      minLatencyMs: 0,
      maxLatencyMs: 60_000,
      maxDeviationFactor: 10,
    },
  },
  output: {
    format: 'table',
    precision: 4,
  },
};
