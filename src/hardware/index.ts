/**
 * Hardware profiles and the hardware timing model
 */

export * from './model.js';
export * from './spec.js';
export * from './presets.js';
