/**
 * Structured logging with Pino
 *
 * Logs go to stderr so command output on stdout stays clean.
 */

import pino from 'pino';

const logLevel = process.env.LOG_LEVEL || 'warn';

export const logger = pino(
  {
    level: logLevel,
    transport: process.env.NODE_ENV === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        destination: 2
      }
    } : undefined,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  process.env.NODE_ENV === 'development' ? undefined : pino.destination(2)
);

/**
 * Apply --quiet / --verbose on top of the configured level
 */
export function setVerbosity(quiet: boolean, verbose: boolean, baseLevel: string = logLevel): void {
  if (verbose) {
    logger.level = 'debug';
  } else if (quiet) {
    logger.level = 'error';
  } else {
    logger.level = baseLevel;
  }
}

export default logger;
