import { getDb } from '../../../src/db/index.js';
import * as schema from '../../../src/db/schema.js';
import type { SessionSnapshot } from '../../../src/auth/types.js';

type AuditInsert = typeof schema.auditLog.$inferInsert;
type TokenInsert = typeof schema.sessionTokens.$inferInsert;

export function insertAuditEntry(
  overrides: Partial<AuditInsert> = {},
): typeof schema.auditLog.$inferSelect {
  const defaults: AuditInsert = {
    timestamp: new Date().toISOString(),
    eventType: 'session',
    category: 'auth',
    summary: 'VALID',
    severity: 'info',
  };
  return getDb()
    .insert(schema.auditLog)
    .values({ ...defaults, ...overrides })
    .returning()
    .get();
}

export function insertSessionToken(
  overrides: Partial<TokenInsert> = {},
): typeof schema.sessionTokens.$inferSelect {
  const issuedAt = Date.now();
  const defaults: TokenInsert = {
    accessToken: 'test-access-token',
    issuedAt,
    expiresAt: issuedAt + 3_600_000,
    status: 'VALID',
    createdAt: new Date(issuedAt).toISOString(),
  };
  return getDb()
    .insert(schema.sessionTokens)
    .values({ ...defaults, ...overrides })
    .returning()
    .get();
}

export function sessionSnapshot(overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    state: 'VALID',
    sessionStatus: 'VALID',
    issuedAt: '2026-01-05T03:00:00.000Z',
    expiresAt: '2026-01-05T22:00:00.000Z',
    expiresInSeconds: 68_400,
    authenticating: false,
    lastError: null,
    lastAttempts: [],
    ...overrides,
  };
}
