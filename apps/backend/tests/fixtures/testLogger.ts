/**
 * Test Logger Fixture
 *
 * A real pino logger that records entries in memory instead of writing them.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export interface LogEntry {
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  msg: string;
  [key: string]: unknown;
}

const LEVEL_NAMES: Record<number, LogEntry['level']> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
};

/**
 * Create a real pino logger that records every entry for assertions
 *
 * @example
 * ```typescript
 * const { logger, getLogsByLevel } = createTestLogger();
 *
 * service.createUser(input, logger);
 *
 * expect(getLogsByLevel('warn')[0]).toMatchObject({ action: 'createUser' });
 * ```
 */
export function createTestLogger(): {
  logger: Logger;
  getLogs: () => LogEntry[];
  getLogsByLevel: (level: LogEntry['level']) => LogEntry[];
  clear: () => void;
} {
  const logs: LogEntry[] = [];

  const logger = pino(
    { level: 'trace', base: {} },
    {
      write(line: string) {
        const parsed: { level: number; msg?: string } & Record<string, unknown> =
          JSON.parse(line);
        logs.push({
          ...parsed,
          level: LEVEL_NAMES[parsed.level] ?? 'info',
          msg: parsed.msg ?? '',
        });
      },
    },
  );

  return {
    logger,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter((entry) => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

