import pino from 'pino';
import type { DestinationStream } from 'pino';

type Environment = 'development' | 'production' | 'test';

/**
 * Creates the console destination: pino-pretty in development,
 * plain NDJSON on stdout everywhere else
 */
export function createConsoleStream(
  env: Environment | string,
  additionalIgnoreFields: string[] = [],
): DestinationStream {
  const ignoreFields = ['pid', 'hostname', ...additionalIgnoreFields];

  if (process.env.LOG_INCLUDE_MODULE !== 'true') {
    ignoreFields.push('module');
  }

  if (env === 'development') {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: ignoreFields.join(','),
        messageFormat: '{msg}',
        errorLikeObjectKeys: ['err', 'error'],
      },
    });
  }

  return pino.destination({ dest: 1, sync: false });
}
