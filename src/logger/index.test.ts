/**
 * Unit tests for the logger
 */

import { describe, it, expect } from '@jest/globals';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import winston from 'winston';
import Transport from 'winston-transport';
import { Logger, parseSize } from './index.js';
import { BackendUnavailableError, ErrorCode, ErrorSeverity } from '../errors/index.js';
import type { Config } from '../config/schema.js';

class MemoryTransport extends Transport {
  readonly entries: Array<Record<string, unknown>> = [];

  override log(info: Record<string, unknown>, next: () => void): void {
    this.entries.push(info);
    next();
  }
}

const loggingConfig: Config['logging'] = {
  level: 'debug',
  format: 'json',
  dir: join(tmpdir(), 'infersim-logger-test-unused'),
  maxFiles: 1,
  maxSize: '1m',
  file: false,
};

function createCapturingLogger(): { logger: Logger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const instance = winston.createLogger({ level: 'debug', transports: [transport] });
  return { logger: new Logger(loggingConfig, instance), transport };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('parseSize', () => {
  it('should parse unit suffixes', () => {
    expect(parseSize('100b')).toBe(100);
    expect(parseSize('512k')).toBe(512 * 1024);
    expect(parseSize('10m')).toBe(10 * 1024 * 1024);
    expect(parseSize('2G')).toBe(2 * 1024 * 1024 * 1024);
  });

  it('should fall back to 10MB for unparseable sizes', () => {
    expect(parseSize('lots')).toBe(10 * 1024 * 1024);
    expect(parseSize('1.5m')).toBe(10 * 1024 * 1024);
  });
});

describe('Logger', () => {
  it('should not create the log directory without file output', () => {
    new Logger(loggingConfig);

    expect(existsSync(loggingConfig.dir)).toBe(false);
  });

  it('should expand simulator error codes', async () => {
    const { logger, transport } = createCapturingLogger();

    logger.error('Estimate failed', new BackendUnavailableError('no model'), { layerName: 'ffn' });
    await flush();

    expect(transport.entries).toHaveLength(1);
    expect(transport.entries[0]).toMatchObject({
      level: 'error',
      message: 'Estimate failed',
      layerName: 'ffn',
      error: { message: 'no model', code: ErrorCode.BACKEND_UNAVAILABLE, severity: ErrorSeverity.LOW },
    });
  });

  it('should carry child metadata', async () => {
    const { logger, transport } = createCapturingLogger();

    logger.child({ component: 'cli' }).info('Scenario loaded', { layers: 3 });
    await flush();

    expect(transport.entries[0]).toMatchObject({ message: 'Scenario loaded', component: 'cli', layers: 3 });
  });
});
