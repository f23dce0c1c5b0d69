import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the latency simulator
 * Extends native Error with a code, a severity and the originating error
 */
export class SimulatorError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'SimulatorError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      name: this.name,
      message: this.message,
      severity: this.severity,
      context: this.context,
      cause: this.originalError?.message,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Application configuration errors (environment, config/default.json)
 */
export class ConfigurationError extends SimulatorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * A hardware spec, runtime shape or layer config field is missing,
 * malformed or out of range. Raised before any estimation runs.
 */
export class ConfigValidationError extends SimulatorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIG_VALIDATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigValidationError';
  }
}

/**
 * A scenario file could not be read or parsed
 */
export class ScenarioLoadError extends SimulatorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.SCENARIO_LOAD_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ScenarioLoadError';
  }
}

/**
 * A fused-op formula received a shape it is undefined for
 */
export class FormulaDomainError extends SimulatorError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.FORMULA_DOMAIN_ERROR, ErrorSeverity.HIGH, context);
    this.name = 'FormulaDomainError';
  }
}

/**
 * The learned latency backend cannot serve a prediction.
 * Recovered by falling back to the analytic backend.
 */
export class BackendUnavailableError extends SimulatorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.BACKEND_UNAVAILABLE, ErrorSeverity.LOW, context, originalError);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * A layer estimate failed and the whole simulation run was abandoned
 */
export class AggregationAbortedError extends SimulatorError {
  public readonly layerName: string;
  public readonly layerIndex: number;

  constructor(layerName: string, layerIndex: number, originalError: Error) {
    super(
      `Simulation aborted at layer '${layerName}' (#${layerIndex}): ${originalError.message}`,
      ErrorCode.AGGREGATION_ABORTED,
      ErrorSeverity.HIGH,
      { layerName, layerIndex },
      originalError
    );
    this.name = 'AggregationAbortedError';
    this.layerName = layerName;
    this.layerIndex = layerIndex;
  }
}

/**
 * Bad command-line usage
 */
export class UsageError extends SimulatorError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context);
    this.name = 'UsageError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
