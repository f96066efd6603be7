/**
 * Error codes for all pyscope errors.
 * Used to identify error types programmatically.
 */
export enum PyscopeErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Source input
  FILE_NOT_READABLE = 'FILE_NOT_READABLE',
  PARSE_FAILED = 'PARSE_FAILED',

  // Analysis
  ANALYSIS_FAILED = 'ANALYSIS_FAILED',

  // CLI input
  INVALID_INPUT = 'INVALID_INPUT',
}
