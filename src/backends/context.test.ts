/**
 * Unit tests for the estimator context lifecycle
 */

import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { EstimatorContext } from './context.js';
import { AnalyticBackend } from './analytic.js';
import type { LatencyRegressor } from './regressor.js';
import { defaultConfig } from '../config/defaults.js';
import { BackendUnavailableError } from '../errors/index.js';
import {
  createMockHardware,
  createRecordingLogger,
  createRuntime,
  createTempFiles,
  ffnLayer,
} from '../__tests__/utils.js';

const plausibility = { minLatencyMs: 0, maxLatencyMs: 60_000, maxDeviationFactor: 10 };
const hardware = createMockHardware();
const runtime = createRuntime(1, 128);
const layer = ffnLayer();
const analytic = new AnalyticBackend().estimate(layer, runtime, hardware);

const echo: LatencyRegressor = {
  predict: () => ({ computeTimeMs: analytic.computeTimeMs, memoryTimeMs: analytic.memoryTimeMs }),
};

describe('EstimatorContext', () => {
  it('should serve analytic estimates without loading anything', () => {
    const context = new EstimatorContext({ backend: 'analytic', plausibility });
    context.load();

    expect(context.backendName).toBe('analytic');
    expect(context.isLoaded).toBe(false);
    expect(context.backend.estimate(layer, runtime, hardware).metadata).toEqual({ backend: 'analytic' });
  });

  it('should warn and fall back when ml has no model path', () => {
    const logger = createRecordingLogger();
    const context = new EstimatorContext({ backend: 'ml', plausibility, logger });
    context.load();

    expect(context.isLoaded).toBe(false);
    expect(logger.entries[0]?.message).toBe('ml backend selected without a model path; estimates will be analytic');
    expect(context.backend.estimate(layer, runtime, hardware).metadata.fallback?.from).toBe('ml');
  });

  it('should serve ml estimates once loaded and fall back after unload', () => {
    const context = new EstimatorContext({
      backend: 'ml',
      modelPath: 'model.json',
      plausibility,
      loadRegressor: () => echo,
    });

    context.load();
    expect(context.isLoaded).toBe(true);
    expect(context.backend.estimate(layer, runtime, hardware).metadata).toEqual({ backend: 'ml' });

    context.unload();
    expect(context.isLoaded).toBe(false);
    expect(context.backend.estimate(layer, runtime, hardware).metadata.backend).toBe('analytic');
  });

  it('should stay unloaded when the model is unavailable', () => {
    const logger = createRecordingLogger();
    const context = new EstimatorContext({
      backend: 'ml',
      modelPath: 'model.json',
      plausibility,
      logger,
      loadRegressor: () => {
        throw new BackendUnavailableError('Cannot read latency model model.json');
      },
    });

    context.load();

    expect(context.isLoaded).toBe(false);
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'Latency model unavailable; estimates will be analytic',
        metadata: { modelPath: 'model.json', reason: 'Cannot read latency model model.json' },
      },
    ]);
  });

  it('should rethrow unexpected load failures', () => {
    const context = new EstimatorContext({
      backend: 'ml',
      modelPath: 'model.json',
      plausibility,
      loadRegressor: () => {
        throw new TypeError('boom');
      },
    });

    expect(() => context.load()).toThrow(TypeError);
  });

  it('should load a linear model file by default', () => {
    const files = createTempFiles({
      'model.json': JSON.stringify({
        version: 1,
        layers: {
          ffn: {
            computeTimeMs: { intercept: analytic.computeTimeMs, weights: {} },
            memoryTimeMs: { intercept: analytic.memoryTimeMs, weights: {} },
          },
        },
      }),
    });
    try {
      const context = new EstimatorContext({ backend: 'ml', modelPath: join(files.dir, 'model.json'), plausibility });
      context.load();

      const execution = context.backend.estimate(layer, runtime, hardware);
      expect(execution.metadata).toEqual({ backend: 'ml' });
      expect(execution.dominantLatencyMs).toBe(analytic.dominantLatencyMs);
    } finally {
      files.cleanup();
    }
  });

  it('should be configured from application config', () => {
    const context = EstimatorContext.fromConfig({
      ...defaultConfig,
      simulator: { ...defaultConfig.simulator, backend: 'ml' },
    });

    expect(context.backendName).toBe('ml');
    expect(context.backend.name).toBe('ml');
  });
});
