/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging to stderr. Stdout belongs to the interactive SSH
 * session, so nothing here may write to fd 1.
 */

import pino from 'pino';

export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true })
);

export type Logger = typeof logger;

/**
 * Raise the log level to debug unless LOG_LEVEL pins it explicitly.
 */
export function enableDebugLogging(): void {
  if (!process.env.LOG_LEVEL) {
    logger.level = 'debug';
  }
}
