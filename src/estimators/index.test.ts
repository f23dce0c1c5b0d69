/**
 * Unit tests for the analytic layer estimators
 */

import { describe, it, expect } from '@jest/globals';
import { estimateLayer, routedTokens } from './index.js';
import { ConfigValidationError, FormulaDomainError } from '../errors/index.js';
import {
  attentionLayer,
  communicationLayer,
  createMockHardware,
  createRuntime,
  ffnLayer,
  moeLayer,
} from '../__tests__/utils.js';

const hardware = createMockHardware();

describe('estimateLayer', () => {
  describe('ffn', () => {
    const layer = ffnLayer({ dModel: 4, dFf: 8, activation: 'relu' });

    it('should sum op metrics and time them on memory bandwidth', () => {
      const execution = estimateLayer(layer, createRuntime(1, 2), hardware);

      expect(Object.keys(execution.breakdown)).toEqual(['ffn_up_proj', 'ffn_activation', 'ffn_down_proj']);
      expect(execution.flops).toBe(272);
      expect(execution.bytesRead).toBe(208);
      expect(execution.bytesWritten).toBe(80);
      expect(execution.computeTimeMs).toBeCloseTo(272 / 1e14 * 1000, 18);
      expect(execution.memoryTimeMs).toBeCloseTo(288 / 1e12 * 1000, 18);
      expect(execution.dominantLatencyMs).toBe(execution.memoryTimeMs);
      expect(execution.estimatedExecutionTimeMs).toBe(execution.dominantLatencyMs);
      expect(execution.metadata).toEqual({ backend: 'analytic' });
    });

    it('should add a gate projection for gated activations', () => {
      const gated = ffnLayer({ dModel: 4, dFf: 8, activation: 'swiglu' });
      const execution = estimateLayer(gated, createRuntime(1, 2), hardware);

      expect(Object.keys(execution.breakdown)).toEqual([
        'ffn_up_proj',
        'ffn_gate_proj',
        'ffn_activation',
        'ffn_down_proj',
      ]);
      expect(execution.features['gated']).toBe(1);
      expect(execution.features['activationFlops']).toBe(5);
    });

    it('should expose runtime and shape features', () => {
      const execution = estimateLayer(layer, createRuntime(1, 2, { microBatch: 1 }), hardware);

      expect(execution.features).toEqual({
        dModel: 4,
        dFf: 8,
        gated: 0,
        activationFlops: 1,
        dtypeBits: 16,
        layerIndex: 0,
        batchSize: 1,
        seqLen: 2,
        microBatch: 1,
        tokensPerExpert: 0,
        concurrencyHint: 1,
        flops: 272,
        bytesRead: 208,
        bytesWritten: 80,
      });
    });
  });

  describe('attention', () => {
    it('should derive head dimensions and sum the four kernels', () => {
      const execution = estimateLayer(attentionLayer({ dModel: 8, numHeads: 2 }), createRuntime(1, 4), hardware);

      expect(execution.layerType).toBe('attention');
      expect(execution.flops).toBe(1536 + 416 + 256 + 512);
      expect(execution.features['headDim']).toBe(4);
      expect(execution.features['numKvHeads']).toBe(2);
    });

    it('should require headDim when dModel does not split evenly', () => {
      expect(() => estimateLayer(attentionLayer({ dModel: 10, numHeads: 4 }), createRuntime(), hardware)).toThrow(
        "Layer 'attn': headDim is required when dModel (10) is not divisible by numHeads (4)"
      );
    });

    it('should reject kv heads that do not divide query heads', () => {
      expect(() =>
        estimateLayer(attentionLayer({ dModel: 64, numHeads: 8, numKvHeads: 3 }), createRuntime(), hardware)
      ).toThrow(ConfigValidationError);
    });
  });

  describe('moe', () => {
    const config = { dModel: 4, expertIntermediateSize: 8, numExperts: 4, expertsPerToken: 2 };

    it('should run router, top-k and routed experts', () => {
      const execution = estimateLayer(moeLayer(config), createRuntime(1, 2), hardware);

      expect(Object.keys(execution.breakdown)).toEqual(['moe_router', 'moe_topk_dispatch', 'moe_expert_matmul']);
      expect(execution.breakdown['moe_expert_matmul']?.flops).toBe(544);
      expect(execution.features['routedTokens']).toBe(4);
    });

    it('should add shared experts and expert-parallel all-to-all when configured', () => {
      const execution = estimateLayer(
        moeLayer({ ...config, numSharedExperts: 1, expertParallel: 2 }),
        createRuntime(1, 2),
        hardware
      );

      expect(Object.keys(execution.breakdown)).toEqual([
        'moe_router',
        'moe_topk_dispatch',
        'moe_expert_matmul',
        'moe_shared_expert',
        'moe_dispatch',
        'moe_combine',
      ]);
    });

    it('should produce all zeros when no expert is selected', () => {
      const execution = estimateLayer(moeLayer({ ...config, expertsPerToken: 0 }), createRuntime(4, 16), hardware);

      expect(execution.flops).toBe(0);
      expect(execution.bytesRead).toBe(0);
      expect(execution.bytesWritten).toBe(0);
      expect(execution.computeTimeMs).toBe(0);
      expect(execution.memoryTimeMs).toBe(0);
      expect(execution.dominantLatencyMs).toBe(0);
    });

    it('should reject more experts per token than experts', () => {
      expect(() =>
        estimateLayer(moeLayer({ ...config, expertsPerToken: 5 }), createRuntime(), hardware)
      ).toThrow("Layer 'moe': expertsPerToken (5) exceeds numExperts (4)");
    });

    it('should fail on dispatch traffic without an interconnect', () => {
      const isolated = createMockHardware({ interconnectGbps: 0 });

      expect(() =>
        estimateLayer(moeLayer({ ...config, expertParallel: 2 }), createRuntime(1, 2), isolated)
      ).toThrow(FormulaDomainError);
    });
  });

  describe('routedTokens', () => {
    const moe = moeLayer({ numExperts: 8, expertsPerToken: 2 }).moe;

    it('should default to tokens times experts per token', () => {
      expect(routedTokens(moe, createRuntime(2, 10))).toBe(40);
    });

    it('should use the measured per-expert load when given', () => {
      expect(routedTokens(moe, createRuntime(2, 10, { tokensPerExpert: 3 }))).toBe(24);
    });

    it('should route nothing when no expert is selected', () => {
      expect(routedTokens({ ...moe, expertsPerToken: 0 }, createRuntime(2, 10, { tokensPerExpert: 3 }))).toBe(0);
    });
  });

  describe('communication', () => {
    it('should time ring traffic on the interconnect', () => {
      const layer = communicationLayer({ pattern: 'all_reduce', payloadMb: 1, worldSize: 4 });
      const execution = estimateLayer(layer, createRuntime(), hardware);

      expect(execution.flops).toBe(0);
      expect(execution.bytesRead).toBe(1.5e6);
      expect(execution.bytesWritten).toBe(1.5e6);
      expect(execution.computeTimeMs).toBe(0);
      expect(execution.memoryTimeMs).toBeCloseTo(0.03, 12);
      expect(execution.features['pattern']).toBe(1);
      expect(execution.features['worldSize']).toBe(4);
    });

    it('should produce all zeros for an empty payload', () => {
      const execution = estimateLayer(communicationLayer({ payloadMb: 0 }), createRuntime(), hardware);

      expect(execution.bytesRead + execution.bytesWritten).toBe(0);
      expect(execution.dominantLatencyMs).toBe(0);
    });

    it('should fail on collective traffic without an interconnect', () => {
      const isolated = createMockHardware({ interconnectGbps: 0 });

      expect(() => estimateLayer(communicationLayer({ payloadMb: 1 }), createRuntime(), isolated)).toThrow(
        FormulaDomainError
      );
    });

    it('should reject a negative payload', () => {
      expect(() => estimateLayer(communicationLayer({ payloadMb: -1 }), createRuntime(), hardware)).toThrow(
        "Layer 'comm': payloadMb must be a non-negative number (got -1)"
      );
    });
  });

  describe('runtime validation', () => {
    it('should reject a non-positive batch size before estimating', () => {
      expect(() => estimateLayer(ffnLayer(), createRuntime(0, 16), hardware)).toThrow('Invalid runtime shape');
    });

    it('should reject a fractional sequence length', () => {
      expect(() => estimateLayer(ffnLayer(), createRuntime(1, 1.5), hardware)).toThrow(ConfigValidationError);
    });
  });

  it('should return frozen executions', () => {
    const execution = estimateLayer(ffnLayer(), createRuntime(), hardware);

    expect(Object.isFrozen(execution)).toBe(true);
    expect(Object.isFrozen(execution.breakdown)).toBe(true);
  });
});
