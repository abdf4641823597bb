/**
 * Custom Error Classes
 */

/**
 * Base error class for all dashsync errors
 */
export class SyncError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends SyncError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends SyncError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Invalid or missing environment configuration
 */
export class ConfigError extends SyncError {
  constructor(message: string, issues?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 500, issues);
    this.name = 'ConfigError';
  }
}

/**
 * Transport-level failure talking to a target (timeout, refused, reset)
 */
export class TargetRequestError extends SyncError {
  public readonly target: string;

  constructor(target: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${operation} request to ${target} failed: ${reason}`,
      'TARGET_REQUEST_ERROR',
      502,
      { target, operation, reason }
    );
    this.name = 'TargetRequestError';
    this.target = target;
  }
}

/**
 * Listing response that is not a file tree
 */
export class ListingFormatError extends SyncError {
  constructor(target: string, reason: string) {
    super(
      `Unexpected listing format from ${target}: ${reason}`,
      'LISTING_FORMAT_ERROR',
      502,
      { target, reason }
    );
    this.name = 'ListingFormatError';
  }
}
