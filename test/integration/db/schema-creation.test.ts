import { sql } from 'drizzle-orm';
import { describe, expect, it } from 'vitest';
import { getDb } from '../../../src/db/index.js';

describe('Schema Creation', () => {
  it('creates the config, token and audit tables', () => {
    const db = getDb();
    const rows = db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    );
    expect(rows.map((r) => r.name)).toEqual(['audit_log', 'config', 'session_tokens']);
  });

  it('creates the lookup indexes', () => {
    const db = getDb();
    const rows = db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type='index' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
    );
    expect(rows.map((r) => r.name)).toEqual(['idx_audit_ts', 'idx_session_tokens_expiry']);
  });

  it('enforces the token status CHECK constraint', () => {
    const db = getDb();
    expect(() => {
      db.run(
        sql`INSERT INTO session_tokens (accessToken, issuedAt, expiresAt, status, createdAt)
            VALUES ('test-access-token', 1, 2, 'MAYBE', '2026-01-05T00:00:00.000Z')`,
      );
    }).toThrow(/CHECK constraint failed/);
  });

  it('defaults a token to VALID', () => {
    const db = getDb();
    db.run(
      sql`INSERT INTO session_tokens (accessToken, issuedAt, expiresAt, createdAt)
          VALUES ('test-access-token', 1, 2, '2026-01-05T00:00:00.000Z')`,
    );
    const [row] = db.all<{ status: string }>(sql`SELECT status FROM session_tokens`);
    expect(row.status).toBe('VALID');
  });
});
