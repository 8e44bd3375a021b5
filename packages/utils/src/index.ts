/**
 * @fiometrics/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error classes
 */

// Centralized logging system
export { logger, Logger, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
