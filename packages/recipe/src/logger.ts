import pino, { stdTimeFunctions } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import type { LogLevel } from './config';

export type RecipeLogger = Logger;

export const createLogger = (level: LogLevel): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export type RecipeLoggerOptions = {
  level?: LogLevel;
  destination?: DestinationStream;
};

export function createRecipeLogger(options: RecipeLoggerOptions = {}): RecipeLogger {
  const loggerOptions = createLogger(options.level ?? 'info');
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
