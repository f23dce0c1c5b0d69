/**
 * Unit tests for the linear latency regressor
 */

import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { LinearLatencyRegressor } from './regressor.js';
import { BackendUnavailableError } from '../errors/index.js';
import { createTempFiles } from '../__tests__/utils.js';

const model = {
  version: 1,
  description: 'test coefficients',
  layers: {
    ffn: {
      computeTimeMs: { intercept: 0.5, weights: { flops: 1e-9 } },
      memoryTimeMs: { intercept: 0, weights: { bytesRead: 2e-9 } },
    },
  },
};

describe('LinearLatencyRegressor', () => {
  it('should evaluate intercept plus weighted features', () => {
    const regressor = LinearLatencyRegressor.fromJSON(model);
    const prediction = regressor.predict('ffn', { flops: 1e9, bytesRead: 5e8, seqLen: 128 });

    expect(prediction.computeTimeMs).toBeCloseTo(1.5, 12);
    expect(prediction.memoryTimeMs).toBeCloseTo(1, 12);
  });

  it('should list the layer types it covers', () => {
    expect(LinearLatencyRegressor.fromJSON(model).layerTypes).toEqual(['ffn']);
  });

  it('should refuse layer types without coefficients', () => {
    const regressor = LinearLatencyRegressor.fromJSON(model);

    expect(() => regressor.predict('moe', {})).toThrow('Latency model has no coefficients for moe layers');
  });

  it('should refuse when a weighted feature is missing', () => {
    const regressor = LinearLatencyRegressor.fromJSON(model);

    expect(() => regressor.predict('ffn', { flops: 1 })).toThrow("Latency model expects feature 'bytesRead'");
  });

  it('should reject an unsupported model version', () => {
    expect(() => LinearLatencyRegressor.fromJSON({ ...model, version: 2 })).toThrow(BackendUnavailableError);
  });

  it('should reject unknown layer types in the model', () => {
    expect(() =>
      LinearLatencyRegressor.fromJSON({ version: 1, layers: { conv: model.layers.ffn } })
    ).toThrow(BackendUnavailableError);
  });

  describe('fromFile', () => {
    it('should load a model file', () => {
      const files = createTempFiles({ 'model.json': JSON.stringify(model) });
      try {
        const regressor = LinearLatencyRegressor.fromFile(join(files.dir, 'model.json'));
        expect(regressor.layerTypes).toEqual(['ffn']);
      } finally {
        files.cleanup();
      }
    });

    it('should report unreadable files as unavailable', () => {
      const files = createTempFiles({ 'broken.json': '{' });
      try {
        expect(() => LinearLatencyRegressor.fromFile(join(files.dir, 'broken.json'))).toThrow(BackendUnavailableError);
        expect(() => LinearLatencyRegressor.fromFile(join(files.dir, 'absent.json'))).toThrow(/^Cannot read latency model/);
      } finally {
        files.cleanup();
      }
    });
  });
});
