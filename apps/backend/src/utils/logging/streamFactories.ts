import pino from 'pino';

type Environment = 'development' | 'production' | 'test';

/**
 * Creates a console stream with pino-pretty formatting for development
 * or plain NDJSON on stdout everywhere else.
 *
 * The stream accepts every level; the logger's own level does the filtering.
 */
export function createConsoleStream(
  env: Environment | string,
  additionalIgnoreFields: string[] = [],
): pino.StreamEntry {
  const ignoreFields = ['pid', 'hostname', ...additionalIgnoreFields];

  if (process.env.LOG_INCLUDE_MODULE !== 'true') {
    ignoreFields.push('module');
  }

  // Pretty output for local development
  if (env === 'development') {
    return {
      level: 'trace',
      stream: pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss',
          ignore: ignoreFields.join(','),
          messageFormat: '{msg}',
          errorLikeObjectKeys: ['err', 'error'],
        },
      }),
    };
  }

  return {
    level: 'trace',
    stream: process.stdout,
  };
}
