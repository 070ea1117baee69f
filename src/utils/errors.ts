/**
 * Error types and codes for routesmith.
 * Every error raised by the tool extends RoutesmithError.
 */

/**
 * Base error class for all routesmith errors.
 */
export class RoutesmithError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RoutesmithError';
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
 * Configuration errors (loading, parsing, schema validation).
 */
export class ConfigError extends RoutesmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid user input, such as a name that yields no usable identifier.
 */
export class ValidationError extends RoutesmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * File generation failures (existing files, external tool failures).
 */
export class GenerationError extends RoutesmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GenerationError';
  }
}

/**
 * Read or write failure on the route registry. The only hard failure of a patch.
 */
export class RegistryIOError extends RoutesmithError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryIOError';
  }
}

export const ErrorCodes = {
  // Configuration (C001-C002)
  CONFIG_PARSE: 'C001',
  CONFIG_INVALID: 'C002',

  // Input (V001-V003)
  INVALID_NAME: 'V001',
  MISSING_ORG: 'V002',
  INVALID_ORG: 'V003',

  // Generation (G002)
  EXTERNAL_TOOL_FAILED: 'G002',

  // Registry I/O (R001-R002)
  REGISTRY_READ: 'R001',
  REGISTRY_WRITE: 'R002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
