import pino, { type Logger } from 'pino';

/**
 * Root pino logger, written to stderr. Components log through
 * `logger.child({ module })`.
 */
export const logger = pino(
  {
    name: 'recipe-match',
    level: process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pino.destination({ fd: 2, sync: false })
);

export type { Logger };
