import { pino } from 'pino';
import type { LevelWithSilentOrString, Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export function createLogger(level: LevelWithSilentOrString = 'info'): Logger {
  return pino({
    name: 'price-gap-watch',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
