import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

const env = process.env.NODE_ENV ?? 'development';
const pretty = env !== 'production' && env !== 'test' && process.stdout.isTTY === true;

const baseOptions: LoggerOptions = {
  name: 'ragline',
  level: process.env.LOG_LEVEL || 'info',
};

function createRootLogger(): Logger {
  if (!pretty) {
    return pino(baseOptions);
  }
  try {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,name',
        },
      },
    });
  } catch {
    // pino-pretty missing: plain JSON lines
    return pino(baseOptions);
  }
}

export const logger: Logger = createRootLogger();

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
