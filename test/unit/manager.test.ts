import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const mockGetConfigRow = vi.fn();
const mockGetAllConfigRows = vi.fn();
const mockInsertConfigIfMissing = vi.fn();
const mockUpsertConfigValue = vi.fn();

vi.mock('../../src/db/repositories/config.js', () => ({
  getConfigRow: (key: string) => mockGetConfigRow(key),
  getAllConfigRows: () => mockGetAllConfigRows(),
  insertConfigIfMissing: (row: unknown) => mockInsertConfigIfMissing(row),
  upsertConfigValue: (...args: unknown[]) => mockUpsertConfigValue(...args),
}));

import { ConfigError } from '../../src/auth/errors.js';
import { CONFIG_DEFAULTS } from '../../src/config/defaults.js';
import { ConfigManager } from '../../src/config/manager.js';

function row(key: string, value: string, category = 'login') {
  return { key, value, category, description: null, updatedAt: '2026-01-01T00:00:00.000Z' };
}

describe('ConfigManager', () => {
  let manager: ConfigManager;

  beforeEach(() => {
    vi.clearAllMocks();
    mockGetConfigRow.mockReturnValue(undefined);
    mockGetAllConfigRows.mockReturnValue([]);
    manager = new ConfigManager();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('seedDefaults', () => {
    it('inserts every default that is missing', async () => {
      mockInsertConfigIfMissing.mockReturnValueOnce(false).mockReturnValue(true);

      const inserted = await manager.seedDefaults();

      expect(mockInsertConfigIfMissing).toHaveBeenCalledTimes(CONFIG_DEFAULTS.length);
      expect(mockInsertConfigIfMissing).toHaveBeenCalledWith(CONFIG_DEFAULTS[0]);
      expect(inserted).toBe(CONFIG_DEFAULTS.length - 1);
    });
  });

  describe('get', () => {
    it('reads the stored value', () => {
      mockGetConfigRow.mockReturnValue(row('login.maxAttempts', '5'));
      expect(manager.get<number>('login.maxAttempts')).toBe(5);
    });

    it('caches stored values', () => {
      mockGetConfigRow.mockReturnValue(row('login.maxAttempts', '5'));
      manager.get('login.maxAttempts');
      manager.get('login.maxAttempts');
      expect(mockGetConfigRow).toHaveBeenCalledTimes(1);
    });

    it('re-reads after the cache is invalidated', () => {
      mockGetConfigRow.mockReturnValue(row('login.maxAttempts', '5'));
      manager.get('login.maxAttempts');
      manager.invalidateCache('login.maxAttempts');
      manager.get('login.maxAttempts');
      manager.invalidateCache();
      manager.get('login.maxAttempts');
      expect(mockGetConfigRow).toHaveBeenCalledTimes(3);
    });

    it('falls back to the built-in default', () => {
      expect(manager.get<string>('session.dailyExpiry')).toBe('03:30');
    });

    it('throws ConfigError for an unknown key', () => {
      expect(() => manager.get('nope.missing')).toThrow(ConfigError);
      expect(() => manager.get('nope.missing')).toThrow('Config key not found: nope.missing');
    });

    it('prefers an environment override', () => {
      vi.stubEnv('LOGIN_MAX_ATTEMPTS', '7');
      mockGetConfigRow.mockReturnValue(row('login.maxAttempts', '5'));

      expect(manager.get<number>('login.maxAttempts')).toBe(7);
      expect(mockGetConfigRow).not.toHaveBeenCalled();
    });

    it('keeps non-JSON overrides as strings', () => {
      vi.stubEnv('DRIVER_CACHE_DIR', '/var/cache/drivers');
      expect(manager.get<string>('driver.cacheDir')).toBe('/var/cache/drivers');
    });

    it('rejects an override that fails validation', () => {
      vi.stubEnv('LOGIN_MODE', 'sometimes');
      expect(() => manager.get('login.mode')).toThrow(
        /^Invalid value for login\.mode from LOGIN_MODE: /,
      );
    });
  });

  describe('set', () => {
    it('stores the JSON value with its default category', async () => {
      await manager.set('login.maxAttempts', 4);
      expect(mockUpsertConfigValue).toHaveBeenCalledWith(
        'login.maxAttempts',
        '4',
        'login',
        'Full login attempts',
      );
    });

    it('files unknown keys under custom', async () => {
      await manager.set('custom.note', 'hello');
      expect(mockUpsertConfigValue).toHaveBeenCalledWith('custom.note', '"hello"', 'custom', null);
    });

    it('drops the cached value', async () => {
      mockGetConfigRow.mockReturnValueOnce(row('login.maxAttempts', '3'));
      expect(manager.get<number>('login.maxAttempts')).toBe(3);

      await manager.set('login.maxAttempts', 4);
      mockGetConfigRow.mockReturnValueOnce(row('login.maxAttempts', '4'));

      expect(manager.get<number>('login.maxAttempts')).toBe(4);
    });

    it('emits changed', async () => {
      const listener = vi.fn();
      manager.on('changed', listener);
      await manager.set('login.headless', false);
      expect(listener).toHaveBeenCalledWith('login.headless', false);
    });

    it('rejects invalid values without writing', async () => {
      await expect(manager.set('login.maxAttempts', 0)).rejects.toBeInstanceOf(ConfigError);
      expect(mockUpsertConfigValue).not.toHaveBeenCalled();
    });
  });

  describe('entries', () => {
    it('reports the source of every value', () => {
      vi.stubEnv('LOGIN_HEADLESS', 'false');
      mockGetAllConfigRows.mockReturnValue([
        row('login.maxAttempts', '5'),
        row('custom.note', '"hello"', 'custom'),
      ]);

      const entries = manager.entries();
      const find = (key: string) => entries.find((e) => e.key === key);

      expect(entries).toHaveLength(CONFIG_DEFAULTS.length + 1);
      expect(find('login.headless')).toMatchObject({ value: false, source: 'env' });
      expect(find('login.maxAttempts')).toMatchObject({
        value: 5,
        source: 'db',
        description: 'Full login attempts',
      });
      expect(find('custom.note')).toEqual({
        key: 'custom.note',
        value: 'hello',
        category: 'custom',
        description: null,
        source: 'db',
      });
      expect(find('session.dailyExpiry')).toMatchObject({ value: '03:30', source: 'default' });
    });

    it('is sorted by key', () => {
      const keys = manager.entries().map((e) => e.key);
      expect(keys).toEqual([...keys].sort());
    });
  });

  describe('envVarFor', () => {
    it.each([
      ['login.maxAttempts', 'LOGIN_MAX_ATTEMPTS'],
      ['login.selectors.pinSubmit', 'LOGIN_SELECTORS_PIN_SUBMIT'],
      ['session.safetyMarginSeconds', 'SESSION_SAFETY_MARGIN_SECONDS'],
      ['auth.credentialsFile', 'AUTH_CREDENTIALS_FILE'],
    ])('%s → %s', (key, env) => {
      expect(ConfigManager.envVarFor(key)).toBe(env);
    });
  });
});
