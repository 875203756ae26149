/**
 * Logging Utilities
 *
 * Centralized exports for all logging-related utilities.
 */

// Main logger (pino-based)
export { logger, createChildLogger } from './logger.ts';

// Stream factories for custom log streams
export { createConsoleStream } from './streamFactories.ts';
