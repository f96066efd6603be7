import { PyscopeErrorCode } from './codes.js';

// Re-export for consumers
export { PyscopeErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all pyscope errors
 */
export class PyscopeError extends Error {
  constructor(
    message: string,
    public readonly code: PyscopeErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'PyscopeError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for machine-readable reports
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Configuration errors (reading, YAML syntax, schema validation)
 */
export class ConfigError extends PyscopeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, PyscopeErrorCode.CONFIG_INVALID, context, 'medium', false);
    this.name = 'ConfigError';
  }
}

/**
 * A source file could not be read or is not valid Python.
 * Terminal for that file; the caller moves on to the next one.
 */
export class ParseError extends PyscopeError {
  constructor(
    message: string,
    public readonly file?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, PyscopeErrorCode.PARSE_FAILED, { ...context, file }, 'low', true);
    this.name = 'ParseError';
  }
}

/**
 * Unexpected failure while extracting structure or computing metrics
 */
export class AnalysisError extends PyscopeError {
  constructor(
    message: string,
    public readonly file?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, PyscopeErrorCode.ANALYSIS_FAILED, { ...context, file }, 'medium', true);
    this.name = 'AnalysisError';
  }
}

/**
 * Type guard to check if an error is a PyscopeError
 */
export function isPyscopeError(error: unknown): error is PyscopeError {
  return error instanceof PyscopeError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
