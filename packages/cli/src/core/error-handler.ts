/**
 * Error Handler - logs failures and turns them into one-line messages
 */

import { AppError, isOperationalError, logger } from '@fiometrics/utils';

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unexpected error occurred';
}

/**
 * Log error with its code and details (for debugging)
 */
export function logError(error: unknown): void {
  if (error instanceof AppError) {
    logger.error('CLI error', error, {
      code: error.code,
      operational: isOperationalError(error),
      details: error.context,
    });
  } else if (error instanceof Error) {
    logger.error('CLI error', error);
  } else {
    logger.error('CLI error', String(error));
  }
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown): string {
  logError(error);
  return formatError(error);
}
