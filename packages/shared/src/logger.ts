import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export type CreateLoggerOptions = {
  name: string;
  level?: string;
};

export function createLoggerOptions(level: string, source?: string): LoggerOptions {
  return {
    level,
    base: source ? { source } : undefined,
    timestamp: stdTimeFunctions.isoTime
  };
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const level = options.level ?? process.env.LOG_LEVEL?.trim() ?? 'info';
  return pino(createLoggerOptions(level || 'info', options.name));
}
