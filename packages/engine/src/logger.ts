/**
 * Root logger construction.
 *
 * Components never create their own root logger; they receive one and
 * derive `logger.child({ component })` from it.
 */

import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  /** Minimum level (default: $SOLSTICE_LOG_LEVEL or 'info') */
  level?: LevelWithSilent;
  /** Route output through pino-pretty (interactive terminals) */
  pretty?: boolean;
}

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function parseLogLevel(value: string | undefined): LevelWithSilent | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env['SOLSTICE_LOG_LEVEL']) ?? 'info';

  return pino({
    name: 'solstice',
    level,
    transport: options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
