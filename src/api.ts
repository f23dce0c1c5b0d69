/**
 * Library entry point
 */

export * from './ops/index.js';
export * from './hardware/index.js';
export * from './estimators/index.js';
export * from './backends/index.js';
export * from './simulator/index.js';
export * from './errors/index.js';
export type * from './types/execution.js';
export type * from './types/hardware.js';
export type * from './types/layers.js';
export type * from './types/runtime.js';
export { LAYER_KINDS, ACTIVATION_KINDS, COMMUNICATION_PATTERNS } from './types/layers.js';
