/**
 * Error types and error codes for the latency simulator
 * Provides structured error handling with proper categorization
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Scenario and layer configuration errors (2000-2999)
  CONFIG_VALIDATION_ERROR = 2000,
  SCENARIO_LOAD_ERROR = 2001,

  // Estimation errors (3000-3999)
  FORMULA_DOMAIN_ERROR = 3000,
  AGGREGATION_ABORTED = 3001,

  // Backend errors (4000-4999)
  BACKEND_UNAVAILABLE = 4000,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  name: string;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  cause?: string;
  stack?: string;
}
