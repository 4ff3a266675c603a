import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

/**
 * Creates a logger that writes to stderr, prefixed with `[scope]`.
 * Stdout belongs to the stdio transport, so nothing is ever written there.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level];
  const write =
    (messageLevel: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVEL_RANK[messageLevel] > threshold) return;
      console.error(`[${scope}] ${message}`, ...details);
    };
  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
  };
}
