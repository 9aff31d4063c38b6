import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Structured JSON logger shared by the module components
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'wallet-security-module',
    level: options.level ?? 'info',
  });
}

/**
 * Logger used by components constructed without one
 */
export const silentLogger: Logger = pino({ level: 'silent' });
