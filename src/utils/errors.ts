/**
 * Error types and codes for the Oracle.
 * All errors raised by this package extend OracleError.
 */

/**
 * Base error class for all Oracle errors.
 */
export class OracleError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OracleError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends OracleError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Registry fetch and document-shape errors.
 */
export class RegistryError extends OracleError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * Bad tool input (missing arguments, malformed npubs, negative amounts).
 */
export class ValidationError extends OracleError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Failures while admitting a citizen (GitHub commit, missing token).
 */
export class CitizenshipError extends OracleError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CitizenshipError';
  }
}

/**
 * Raised by tools that are announced but not built yet.
 */
export class NotImplementedToolError extends OracleError {
  constructor(public readonly tool: string, planned: string) {
    super(ErrorCodes.NOT_IMPLEMENTED, `${tool} is not yet implemented. Planned: ${planned}`, { tool });
    this.name = 'NotImplementedToolError';
  }
}

export const ErrorCodes = {
  // Configuration (C001-C002)
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // Registry (R001-R002)
  REGISTRY_FETCH_FAILED: 'R001',
  REGISTRY_INVALID: 'R002',

  // Input validation (V001-V004)
  MISSING_ARGUMENT: 'V001',
  INVALID_NPUB: 'V002',
  INVALID_AMOUNT: 'V003',
  INVALID_ARGUMENT: 'V004',

  // Citizenship (G001-G002)
  GITHUB_TOKEN_MISSING: 'G001',
  COMMIT_FAILED: 'G002',

  // Stubs
  NOT_IMPLEMENTED: 'X001',

  // Parsing
  PARSE_ERROR: 'S001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
