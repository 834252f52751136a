/**
 * dealbook — Shared Types
 *
 * Configuration schema and the Result type used by modules that
 * report failures as values instead of throwing.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ConfigSchema = z.object({
  paths: z.object({
    base_dir: z.string().default('~/.dealbook'),
    database_file: z.string().default('crm.db'),
    log_dir: z.string().default('logs'),
    config_file: z.string().default('config.json'),
  }),
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
