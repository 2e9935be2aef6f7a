import { destination, pino, type Logger, type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';
// Vitest sets NODE_ENV=test; the pretty transport runs in a worker thread we don't want there
const usePretty = isDev && process.env['NODE_ENV'] !== 'test';

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['EBUILD_HISTORY_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode. Logs go to stderr so stdout stays parseable.
if (usePretty) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger: Logger = usePretty ? pino(options) : pino(options, destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
