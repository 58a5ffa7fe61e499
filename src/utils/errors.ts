/**
 * Error types and codes for govkit.
 * Every thrown error should extend GovkitError; validation findings are
 * reported as ValidationIssue values instead.
 */

/**
 * Base error class for all govkit errors.
 */
export class GovkitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GovkitError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (manifest pointers, config loading, schema validation).
 */
export class ConfigError extends GovkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, git failures).
 */
export class SystemError extends GovkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_NOT_FOUND: 'C001',
  CONFIG_POINTER_MISSING: 'C002',
  CONFIG_INVALID: 'C003',
  PARENT_CONFIG_NOT_FOUND: 'C004',

  // System
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  GIT_ERROR: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
