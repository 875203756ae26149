import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';
import { createConsoleStream } from './streamFactories.ts';

// Determine environment from NODE_ENV
const env = process.env.NODE_ENV || 'development';

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * The LOG_LEVEL value when set, otherwise `debug` in development and `info`
 * elsewhere. Throws on an unknown level name.
 */
export function resolveLogLevel(
  level: string | undefined,
  environment: string,
): LogLevel {
  if (!level) {
    return environment === 'development' ? 'debug' : 'info';
  }
  return logLevelSchema.parse(level);
}

interface ErrorInfo {
  constructor: { name: string };
  message: string;
  stack?: string;
  code?: string;
  statusCode?: number;
}

// Custom serializers for enhanced logging
const serializers = {
  // Error serializer that keeps the domain error code
  err: (err: ErrorInfo | null | undefined) => {
    if (!err) return err;
    return {
      type: err.constructor.name,
      message: err.message,
      stack: err.stack,
      code: err.code,
      statusCode: err.statusCode,
    };
  },
};

// Configure streams for multistream using factory functions
const streams: pino.StreamEntry[] = [createConsoleStream(env)];

// Create the main logger with multistream
const logger: Logger = pino(
  {
    level: resolveLogLevel(process.env.LOG_LEVEL, env),
    serializers,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {}, // Remove all base fields for cleaner logs
  },
  pino.multistream(streams),
);

interface LoggerContext {
  module?: string;
  [key: string]: unknown;
}

/**
 * Create child logger factory
 */
export const createChildLogger = (
  name: string,
  additionalContext: Record<string, unknown> = {},
): Logger => {
  const childContext: LoggerContext = { ...additionalContext };

  childContext.module = name;

  return logger.child(childContext);
};

// Export main logger
export { logger };
