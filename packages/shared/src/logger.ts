import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

// stdout belongs to the renderer, so log lines go to stderr.
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'warn'),
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['headers.Authorization', 'credentials.appPassword', 'credentials.token'],
      remove: true
    }
  },
  pino.destination(2)
);

export type Logger = typeof logger;

export const createScopedLogger = (scope: string): Logger => logger.child({ scope });
