/**
 * dealbook — Configuration Management
 *
 * Handles loading, validation, and path resolution for all configuration.
 * The user file at ~/.dealbook/config.json is merged section by section
 * over DEFAULT_CONFIG and validated with ConfigSchema.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.dealbook');

export const DEFAULT_CONFIG: Config = {
  paths: {
    base_dir: DEFAULT_BASE_DIR,
    database_file: 'crm.db',
    log_dir: 'logs',
    config_file: 'config.json',
  },
  logging: {
    level: 'info',
  },
};

const UserConfigSchema = z.object({
  paths: ConfigSchema.shape.paths.partial().optional(),
  logging: ConfigSchema.shape.logging.partial().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Config): string {
  return expandPath(config?.paths.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

export function getPath(relativePath: string, config?: Config): string {
  return path.join(getBaseDir(config), relativePath);
}

export function getDatabasePath(config?: Config): string {
  return getPath(config?.paths.database_file ?? DEFAULT_CONFIG.paths.database_file, config);
}

export function getLogsPath(config?: Config): string {
  return getPath(config?.paths.log_dir ?? DEFAULT_CONFIG.paths.log_dir, config);
}

export function getConfigPath(config?: Config): string {
  return getPath(config?.paths.config_file ?? DEFAULT_CONFIG.paths.config_file, config);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function ensureDirectories(config?: Config): Result<void, Error> {
  try {
    const baseDir = getBaseDir(config);
    const logsDir = getLogsPath(config);

    if (!fs.existsSync(baseDir)) {
      fs.mkdirSync(baseDir, { recursive: true, mode: 0o700 });
    }

    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true, mode: 0o700 });
    }

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Load configuration from file, merge with defaults.
 * A missing file yields the defaults.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const configPath = customPath ?? getConfigPath();
    const expandedPath = expandPath(configPath);

    let userConfig: z.infer<typeof UserConfigSchema> = {};

    if (fs.existsSync(expandedPath)) {
      const content = fs.readFileSync(expandedPath, 'utf-8');
      const parsed = UserConfigSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        return err(new Error(`Invalid configuration: ${parsed.error.message}`));
      }
      userConfig = parsed.data;
    }

    const merged = {
      paths: { ...DEFAULT_CONFIG.paths, ...userConfig.paths },
      logging: { ...DEFAULT_CONFIG.logging, ...userConfig.logging },
    };

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function saveConfig(config: Config, customPath?: string): Result<void, Error> {
  try {
    const validated = ConfigSchema.parse(config);
    const configPath = customPath ?? getConfigPath(validated);
    const expandedPath = expandPath(configPath);
    const dir = path.dirname(expandedPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(expandedPath, JSON.stringify(validated, null, 2), {
      mode: 0o600,
      encoding: 'utf-8',
    });

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
