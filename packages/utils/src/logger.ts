/**
 * Logger
 *
 * Pino-based structured logger shared by every package.
 * Writes to stderr so that CLI output on stdout stays clean.
 */

import { destination, pino, type Logger as PinoLogger, type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'chaptify',
    env: NODE_ENV,
  },
};

export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname,service,env',
          destination: 2,
        },
      },
    })
  : pino(options, destination(2));

export type Logger = PinoLogger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
