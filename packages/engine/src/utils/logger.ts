import pino from 'pino';

export const logger = pino({
  name: 'strata',
  level: process.env.LOG_LEVEL || 'info',
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
