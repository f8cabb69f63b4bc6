import pino, { stdTimeFunctions, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino({
    name: options.name ?? 'stepweave',
    level: options.level ?? 'info',
    base: undefined,
    timestamp: stdTimeFunctions.isoTime,
  });

/** Logger that drops everything; the default when none is injected. */
export const silentLogger = (): Logger => pino({ level: 'silent' });
