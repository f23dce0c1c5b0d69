export { AnalyticBackend } from './analytic.js';
export { MachineLearnedBackend, checkPlausibility, type RegressorSource } from './ml.js';
export { FallbackBackend } from './fallback.js';
export {
  LinearLatencyRegressor,
  LinearModelSchema,
  type LatencyPrediction,
  type LatencyRegressor,
  type LinearModel,
} from './regressor.js';
export { EstimatorContext, type EstimatorContextOptions } from './context.js';
export type { BackendLogger, EstimatorBackend } from './types.js';
