// config/default.ts
import path from 'path';
import { z } from 'zod';
import { PASSWORD_HASHING } from '../constants.ts';
import {
  createChildLogger,
  logLevelSchema,
  resolveLogLevel,
} from '../utils/logging/logger.ts';
import type { LogLevel } from '../utils/logging/logger.ts';

const configLogger = createChildLogger('config');

export type Environment = 'development' | 'production' | 'test';
export type StorageDriver = 'memory' | 'sqlite';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: logLevelSchema.or(z.literal('')).optional(),
  STORAGE_DRIVER: z.enum(['memory', 'sqlite']).default('memory'),
  STORAGE_BASE: z.string().min(1).optional(),
  PASSWORD_HASH_ITERATIONS: z.coerce
    .number()
    .int()
    .min(
      PASSWORD_HASHING.ITERATIONS_MIN,
      `PASSWORD_HASH_ITERATIONS must be at least ${PASSWORD_HASHING.ITERATIONS_MIN}`,
    )
    .default(PASSWORD_HASHING.ITERATIONS_DEFAULT),
});

interface StorageConfig {
  driver: StorageDriver;
  base: string;
  databaseFile: string;
}

interface SecurityConfig {
  passwordHashIterations: number;
}

interface LoggingConfig {
  /** Level the root logger was built with */
  level: LogLevel;
}

export interface Config {
  env: Environment;
  logging: LoggingConfig;
  storage: StorageConfig;
  security: SecurityConfig;
}

function determineStorageBase(explicit: string | undefined): string {
  // If explicitly set through environment variable, use that
  if (explicit) {
    return explicit;
  }
  return path.join(process.cwd(), 'worklane-data');
}

/**
 * Build the configuration from an environment map.
 * Throws when a variable is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  const base = determineStorageBase(parsed.STORAGE_BASE);

  if (parsed.NODE_ENV === 'production' && parsed.STORAGE_DRIVER === 'memory') {
    configLogger.warn(
      'Using in-memory storage in production. Set STORAGE_DRIVER=sqlite to keep data across restarts.',
    );
  }

  return {
    env: parsed.NODE_ENV,
    logging: {
      level: resolveLogLevel(parsed.LOG_LEVEL, parsed.NODE_ENV),
    },
    storage: {
      driver: parsed.STORAGE_DRIVER,
      base,
      databaseFile: path.join(base, 'worklane.db'),
    },
    security: {
      passwordHashIterations: parsed.PASSWORD_HASH_ITERATIONS,
    },
  };
}

export const config: Config = loadConfig();
