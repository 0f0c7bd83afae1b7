/**
 * Centralized error type definitions for agreement placeholder generation
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  RESOURCE_READ_ERROR = 'RESOURCE_READ_ERROR',
  RESOURCE_VALIDATION_ERROR = 'RESOURCE_VALIDATION_ERROR',
  UNRECOGNIZED_CATEGORY = 'UNRECOGNIZED_CATEGORY',
  PLACEHOLDER_COLLISION = 'PLACEHOLDER_COLLISION',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A template resource (footer text, term labels) could not be read
 */
export class ResourceReadError extends AppError {
  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Could not read template resource '${path}': ${reason}`,
      ErrorCode.RESOURCE_READ_ERROR,
      { path },
      { cause }
    );
  }
}

export class ResourceValidationError extends AppError {
  constructor(path: string, issues: string[]) {
    super(
      `Invalid template resource '${path}': ${issues.join('; ')}`,
      ErrorCode.RESOURCE_VALIDATION_ERROR,
      { path, issues }
    );
  }
}

/**
 * A category value outside its closed enumeration reached a classification
 */
export class UnrecognizedCategoryError extends AppError {
  constructor(kind: 'AccessCategory' | 'FileAccessRight', value: unknown) {
    super(
      `Unrecognized ${kind}: ${String(value)}`,
      ErrorCode.UNRECOGNIZED_CATEGORY,
      { kind, value: String(value) }
    );
  }
}

export class PlaceholderCollisionError extends AppError {
  constructor(key: string) {
    super(
      `Placeholder '${key}' is produced by more than one extraction`,
      ErrorCode.PLACEHOLDER_COLLISION,
      { key }
    );
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, context);
  }
}
