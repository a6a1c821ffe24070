import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type { Logger };

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: { name: string; level?: string }): Logger {
  return pino({ ...createLoggerOptions(options.level ?? 'info'), name: options.name });
}

/** A logger that drops everything; handy for tests and library defaults. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
