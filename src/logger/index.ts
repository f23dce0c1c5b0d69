import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { SimulatorError } from '../errors/index.js';

/**
 * Logger module using Winston
 *
 * Console output goes to stderr: stdout carries reports and the MCP stdio
 * transport.
 */

const LEVELS = ['error', 'warn', 'info', 'debug'];
const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;

/**
 * Parse a size such as "10m" into bytes
 */
export function parseSize(size: string): number {
  const units: Record<string, number> = {
    b: 1,
    k: 1024,
    m: 1024 * 1024,
    g: 1024 * 1024 * 1024,
  };

  const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
  const num = match?.[1];
  const unit = match?.[2];
  if (!num || !unit) {
    return DEFAULT_MAX_SIZE;
  }

  return parseInt(num, 10) * (units[unit] ?? 1);
}

export class Logger {
  private logger: winston.Logger;
  private readonly config: Config['logging'];

  constructor(config: Config['logging'], instance?: winston.Logger) {
    this.config = config;
    if (instance) {
      this.logger = instance;
      return;
    }
    if (config.file) {
      this.ensureLogDirectory();
    }
    this.logger = this.createLogger();
  }

  private ensureLogDirectory(): void {
    if (!existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );
    }
  }

  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [new winston.transports.Console({ stderrLevels: LEVELS })];

    if (this.config.file) {
      const maxsize = parseSize(this.config.maxSize);

      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'infersim-combined.log'),
          maxsize,
          maxFiles: this.config.maxFiles,
        })
      );

      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'infersim-error.log'),
          level: 'error',
          maxsize,
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log an error, expanding simulator error codes and severity
   */
  error(message: string, error?: Error, metadata?: object): void {
    const errorMetadata = error
      ? {
          error: {
            message: error.message,
            stack: error.stack,
            ...(error instanceof SimulatorError ? { code: error.code, severity: error.severity } : {}),
          },
          ...metadata,
        }
      : metadata;

    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
