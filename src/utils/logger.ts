/**
 * dealbook — Logging Utilities
 *
 * Structured logging using Pino with consistent formatting.
 * DEALBOOK_LOG_LEVEL overrides the configured level. Logs go to stderr;
 * stdout carries command output only.
 *
 * @module utils/logger
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';
import { LogLevelSchema } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export const logDestination = pino.destination({ dest: 2, sync: true });

function resolveLevel(explicit?: string): string {
  if (explicit) return explicit;

  const fromEnv = LogLevelSchema.safeParse(process.env.DEALBOOK_LOG_LEVEL);
  if (fromEnv.success) return fromEnv.data;

  return getConfig().logging.level;
}

export function createLogger(name: string, options?: { level?: string }): pino.Logger {
  const opts: pino.LoggerOptions = {
    name,
    level: resolveLevel(options?.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return pino(opts, logDestination);
}

// ═══════════════════════════════════════════════════════════════════════════
// PRE-CONFIGURED LOGGERS
// ═══════════════════════════════════════════════════════════════════════════

export const cliLogger = createLogger('dealbook:cli');

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    if ('code' in error && typeof error.code === 'string') {
      result.code = error.code;
    }
    return result;
  }

  return { message: String(error) };
}
