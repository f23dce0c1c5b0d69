import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';
import { isRecord } from '../utils/keys.js';
import { describeIssues } from '../utils/zod.js';

type RawSection = Record<string, unknown>;
type RawConfig = Record<keyof Config, RawSection>;

const SECTIONS: readonly (keyof Config)[] = ['logging', 'mcp', 'simulator', 'output'];

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 *
 * Values are collected untyped and validated once by ConfigSchema.
 */
export class ConfigLoader {
  private config: Config;

  constructor(private readonly configPath: string = join(process.cwd(), 'config', 'default.json')) {
    // Load .env file if it exists
    loadEnv();

    const raw = this.fromDefaults();
    this.loadFromFile(raw);
    this.loadFromEnv(raw);
    this.config = this.validate(raw);
  }

  private fromDefaults(): RawConfig {
    const clone = structuredClone(defaultConfig);
    return {
      logging: { ...clone.logging },
      mcp: { ...clone.mcp },
      simulator: { ...clone.simulator },
      output: { ...clone.output },
    };
  }

  /**
   * Merge config/default.json over the defaults, one level deep
   */
  private loadFromFile(raw: RawConfig): void {
    if (!existsSync(this.configPath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to load config file ${this.configPath}`, undefined, toError(error));
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config file ${this.configPath} must contain a JSON object`);
    }

    for (const section of SECTIONS) {
      const value = parsed[section];
      if (isRecord(value)) {
        Object.assign(raw[section], value);
      }
    }
  }

  /**
   * Load configuration from INFERSIM_* environment variables
   */
  private loadFromEnv(raw: RawConfig): void {
    const env = process.env;
    const set = (section: keyof Config, key: string, name: string, parse: (value: string) => unknown = String) => {
      const value = env[name];
      if (value !== undefined) {
        raw[section][key] = parse(value);
      }
    };
    const plausibility = (key: string, name: string) => {
      const value = env[name];
      if (value !== undefined) {
        const current = raw.simulator['plausibility'];
        raw.simulator['plausibility'] = { ...(isRecord(current) ? current : {}), [key]: Number(value) };
      }
    };

    // Logging configuration
    set('logging', 'level', 'INFERSIM_LOG_LEVEL');
    set('logging', 'format', 'INFERSIM_LOG_FORMAT');
    set('logging', 'dir', 'INFERSIM_LOG_DIR');
    set('logging', 'maxFiles', 'INFERSIM_LOG_MAX_FILES', Number);
    set('logging', 'maxSize', 'INFERSIM_LOG_MAX_SIZE');
    set('logging', 'file', 'INFERSIM_LOG_FILE', (value) => value === 'true');

    // MCP configuration
    set('mcp', 'serverName', 'INFERSIM_SERVER_NAME');
    set('mcp', 'serverVersion', 'INFERSIM_SERVER_VERSION');

    // Simulator configuration
    set('simulator', 'backend', 'INFERSIM_BACKEND');
    set('simulator', 'modelPath', 'INFERSIM_MODEL_PATH');
    plausibility('minLatencyMs', 'INFERSIM_MIN_LATENCY_MS');
    plausibility('maxLatencyMs', 'INFERSIM_MAX_LATENCY_MS');
    plausibility('maxDeviationFactor', 'INFERSIM_MAX_DEVIATION_FACTOR');

    // Output configuration
    set('output', 'format', 'INFERSIM_OUTPUT_FORMAT');
    set('output', 'precision', 'INFERSIM_OUTPUT_PRECISION', Number);
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(raw: RawConfig): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(`Configuration validation failed: ${describeIssues(result.error)}`, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export types
export type { Config } from './schema.js';
