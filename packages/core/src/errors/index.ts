/**
 * Custom Error Classes
 */

/**
 * Base error class for all sortwell errors
 */
export class SortwellError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SortwellError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unusable configuration file
 */
export class ConfigurationError extends SortwellError {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(
      `Invalid configuration in ${source}: ${issues.join('; ')}`,
      'CONFIGURATION_ERROR',
      { source, issues }
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A file could not be relocated; the source is left where it was
 */
export class FileTransferError extends SortwellError {
  constructor(
    source: string,
    destination: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Could not move ${source} to ${destination}: ${reason}`,
      'FILE_TRANSFER_ERROR',
      { source, destination },
      { cause }
    );
    this.name = 'FileTransferError';
  }
}

/**
 * Every `_N` variant of a file name up to the cap is already taken
 */
export class UniqueNameExhaustedError extends SortwellError {
  constructor(target: string, attempts: number) {
    super(
      `No free name for ${target} after ${attempts} attempts`,
      'UNIQUE_NAME_EXHAUSTED',
      { target, attempts }
    );
    this.name = 'UniqueNameExhaustedError';
  }
}
