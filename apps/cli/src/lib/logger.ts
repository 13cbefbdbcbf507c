import pino from 'pino';
import type { LogLevel, LogFormat } from '@whale-signal/config';

export type Logger = pino.Logger;

/**
 * Create a configured logger instance
 */
export function createLogger(level: LogLevel = 'info', format: LogFormat = 'pretty'): Logger {
  const options: pino.LoggerOptions = {
    level,
    base: { service: 'whale-signal' },
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    }),
  };

  return pino(options);
}
