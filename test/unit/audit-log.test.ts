import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockLogError = vi.fn();
vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: (...args: unknown[]) => mockLogError(...args),
    debug: vi.fn(),
  }),
}));

const inserted: Array<Record<string, unknown>> = [];
const mockGetDb = vi.fn(() => ({
  insert: () => ({
    values: (row: Record<string, unknown>) => ({
      run: () => {
        inserted.push(row);
      },
    }),
  }),
}));

vi.mock('../../src/db/index.js', () => ({
  getDb: () => mockGetDb(),
}));

import { AuditLogger, getAuditLogger, isAuditEventType } from '../../src/monitoring/audit-log.js';

describe('AuditLogger', () => {
  let audit: AuditLogger;

  beforeEach(() => {
    inserted.length = 0;
    vi.clearAllMocks();
    audit = new AuditLogger();
  });

  it('writes status events with their severity and details', () => {
    audit.logStatusEvent({ type: 'VALID', at: 0, expiresAt: 3_600_000 });
    audit.logStatusEvent({ type: 'FAILED', at: 0, reason: 'MPIN rejected' });
    audit.logStatusEvent({ type: 'REVOKED', at: 0, reason: 'logged out' });

    expect(inserted.map((r) => [r.summary, r.severity])).toEqual([
      ['VALID', 'info'],
      ['FAILED:MPIN rejected', 'error'],
      ['REVOKED', 'warn'],
    ]);
    expect(inserted[0]).toMatchObject({
      eventType: 'session',
      category: 'auth',
      stage: null,
      details: JSON.stringify({ at: '1970-01-01T00:00:00.000Z', expiresAt: '1970-01-01T01:00:00.000Z' }),
    });
  });

  it('records the stage of a login attempt', () => {
    audit.logLoginAttempt('TOTP_SUBMITTED', 'Login attempt 1 failed: timeout', true);

    expect(inserted[0]).toMatchObject({
      eventType: 'login',
      stage: 'TOTP_SUBMITTED',
      details: null,
      severity: 'warn',
    });
  });

  it('files config, error and control entries under their categories', () => {
    audit.logConfig('Config updated');
    audit.logError('Token request failed');
    audit.logControl('Logged out via API');

    expect(inserted.map((r) => [r.eventType, r.category, r.severity])).toEqual([
      ['config', 'system', 'info'],
      ['error', 'system', 'error'],
      ['control', 'user', 'info'],
    ]);
  });

  it('logs instead of throwing when the database is unavailable', () => {
    mockGetDb.mockImplementationOnce(() => {
      throw new Error('Database not initialized. Call initDatabase() first.');
    });

    expect(() => audit.logControl('Logged out via API')).not.toThrow();
    expect(mockLogError).toHaveBeenCalledWith({ err: expect.any(Error) }, 'Failed to write audit log');
  });
});

describe('audit helpers', () => {
  it('returns one shared logger', () => {
    expect(getAuditLogger()).toBe(getAuditLogger());
  });

  it('recognizes audit event types', () => {
    expect(isAuditEventType('login')).toBe(true);
    expect(isAuditEventType('trade')).toBe(false);
  });
});
