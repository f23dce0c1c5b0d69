import type { Config, PlausibilityConfig } from '../config/schema.js';
import { BackendUnavailableError } from '../errors/index.js';
import type { BackendName } from '../types/execution.js';
import { AnalyticBackend } from './analytic.js';
import { FallbackBackend } from './fallback.js';
import { MachineLearnedBackend } from './ml.js';
import { LinearLatencyRegressor, type LatencyRegressor } from './regressor.js';
import type { BackendLogger, EstimatorBackend } from './types.js';

export interface EstimatorContextOptions {
  backend: BackendName;
  modelPath?: string;
  plausibility: PlausibilityConfig;
  logger?: BackendLogger;
  /** Replaces LinearLatencyRegressor.fromFile */
  loadRegressor?: (path: string) => LatencyRegressor;
}

/**
 * Owns the selected backend and whatever model it needs. Constructed
 * explicitly and passed to callers; nothing here is global.
 */
export class EstimatorContext {
  private regressor: LatencyRegressor | null = null;
  private readonly wrapped: EstimatorBackend;

  constructor(private readonly options: EstimatorContextOptions) {
    const analytic = new AnalyticBackend();
    const primary =
      options.backend === 'ml'
        ? new MachineLearnedBackend(() => this.regressor, options.plausibility)
        : analytic;
    this.wrapped = new FallbackBackend(primary, analytic, options.logger);
  }

  static fromConfig(config: Config, logger?: BackendLogger): EstimatorContext {
    return new EstimatorContext({
      backend: config.simulator.backend,
      modelPath: config.simulator.modelPath,
      plausibility: config.simulator.plausibility,
      logger,
    });
  }

  get backendName(): BackendName {
    return this.options.backend;
  }

  get isLoaded(): boolean {
    return this.regressor !== null;
  }

  /**
   * Falls back to analytic estimates, not an error
   */
  load(): void {
    if (this.options.backend !== 'ml' || this.regressor) {
      return;
    }

    const { modelPath, logger } = this.options;
    if (!modelPath) {
      logger?.warn('ml backend selected without a model path; estimates will be analytic');
      return;
    }

    const loadRegressor = this.options.loadRegressor ?? LinearLatencyRegressor.fromFile;
    try {
      this.regressor = loadRegressor(modelPath);
      logger?.info('Latency model loaded', { modelPath });
    } catch (error) {
      if (!(error instanceof BackendUnavailableError)) {
        throw error;
      }
      logger?.warn('Latency model unavailable; estimates will be analytic', { modelPath, reason: error.message });
    }
  }

  unload(): void {
    if (this.regressor) {
      this.regressor = null;
      this.options.logger?.debug('Latency model unloaded');
    }
  }

  /**
   * The selected backend, wrapped so that an unavailable model degrades to
   * analytic estimates
   */
  get backend(): EstimatorBackend {
    return this.wrapped;
  }
}
