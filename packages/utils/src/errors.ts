/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by every package.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context);
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', { configKey, ...context });
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}
