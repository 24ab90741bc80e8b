import { EventEmitter } from 'node:events';
import { ConfigError } from '../auth/errors.js';
import {
  getAllConfigRows,
  getConfigRow,
  insertConfigIfMissing,
  upsertConfigValue,
} from '../db/repositories/config.js';
import { safeJsonParse } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS, type ConfigDefault } from './defaults.js';
import { validateConfigValue } from './schema-validator.js';

const log = createLogger('config');

export type ConfigSource = 'env' | 'db' | 'default';

export interface ConfigEntry {
  key: string;
  value: unknown;
  category: string;
  description: string | null;
  source: ConfigSource;
}

interface ConfigManagerEvents {
  changed: [key: string, value: unknown];
}

const defaultsByKey = new Map<string, ConfigDefault>(CONFIG_DEFAULTS.map((d) => [d.key, d]));

/**
 * Layered settings: environment variable, then the config table, then the
 * built-in default. Values are JSON-encoded in the table.
 */
export class ConfigManager extends EventEmitter<ConfigManagerEvents> {
  private cache = new Map<string, { value: unknown; expiresAt: number }>();
  private cacheTTL = 30_000;

  async seedDefaults(): Promise<number> {
    let inserted = 0;
    for (const def of CONFIG_DEFAULTS) {
      if (insertConfigIfMissing({ ...def })) inserted++;
    }
    log.info({ inserted, known: CONFIG_DEFAULTS.length }, 'Config defaults seeded');
    return inserted;
  }

  get<T>(key: string): T {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) return envOverride as T;

    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > Date.now()) {
      return cached.value as T;
    }

    const row = getConfigRow(key);
    if (row) {
      const parsed: unknown = JSON.parse(row.value);
      this.cache.set(key, { value: parsed, expiresAt: Date.now() + this.cacheTTL });
      return parsed as T;
    }

    const def = defaultsByKey.get(key);
    if (def) {
      return JSON.parse(def.value) as T;
    }

    throw new ConfigError(`Config key not found: ${key}`);
  }

  async set(key: string, value: unknown): Promise<void> {
    const validation = validateConfigValue(key, value);
    if (!validation.valid) {
      throw new ConfigError(`Invalid value for ${key}: ${validation.error}`, [
        { field: key, message: validation.error ?? 'invalid' },
      ]);
    }

    const def = defaultsByKey.get(key);
    upsertConfigValue(key, JSON.stringify(value), def?.category ?? 'custom', def?.description ?? null);
    this.cache.delete(key);
    log.info({ key }, 'Config updated');
    this.emit('changed', key, value);
  }

  /** Every known key with its effective value and where that value came from. */
  entries(): ConfigEntry[] {
    const rows = new Map(getAllConfigRows().map((row) => [row.key, row]));
    const keys = new Set([...defaultsByKey.keys(), ...rows.keys()]);

    return [...keys].sort().map((key): ConfigEntry => {
      const def = defaultsByKey.get(key);
      const row = rows.get(key);
      const category = row?.category ?? def?.category ?? 'custom';
      const description = row?.description ?? def?.description ?? null;
      const envOverride = this.getEnvOverride(key);
      if (envOverride !== undefined) {
        return { key, value: envOverride, category, description, source: 'env' };
      }
      if (row) {
        return { key, value: safeJsonParse<unknown>(row.value, row.value), category, description, source: 'db' };
      }
      return {
        key,
        value: def ? safeJsonParse<unknown>(def.value, def.value) : null,
        category,
        description,
        source: 'default',
      };
    });
  }

  invalidateCache(key?: string): void {
    if (key) {
      this.cache.delete(key);
    } else {
      this.cache.clear();
    }
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "login.maxAttempts" → "LOGIN_MAX_ATTEMPTS"
   *      "login.selectors.pinSubmit" → "LOGIN_SELECTORS_PIN_SUBMIT"
   */
  static envVarFor(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings.
   * An override that fails the key's schema is a startup error, not a fallback.
   */
  private getEnvOverride(key: string): unknown {
    const envName = ConfigManager.envVarFor(key);
    const envValue = process.env[envName];
    if (envValue === undefined) return undefined;

    const value = safeJsonParse<unknown>(envValue, envValue);
    const validation = validateConfigValue(key, value);
    if (!validation.valid) {
      throw new ConfigError(`Invalid value for ${key} from ${envName}: ${validation.error}`, [
        { field: key, message: validation.error ?? 'invalid' },
      ]);
    }
    return value;
  }
}

export const configManager = new ConfigManager();
