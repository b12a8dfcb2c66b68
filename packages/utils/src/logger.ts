/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Writes to stderr so stdout stays free for command output.
 */

import pino, { type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'warn';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'tracksmith',
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
  : pino(options, pino.destination(2));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
