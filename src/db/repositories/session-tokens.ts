import { and, desc, eq, gt, lt, ne } from 'drizzle-orm';
import type { TokenCache } from '../../auth/session-manager.js';
import type { Session } from '../../auth/types.js';
import { getDb } from '../index.js';
import { sessionTokens } from '../schema.js';

export type SessionTokenRow = typeof sessionTokens.$inferSelect;

/** How long expired and revoked rows stay for the audit trail. */
export const TOKEN_RETENTION_MS = 30 * 24 * 3_600_000;

export function saveSessionToken(session: Session): SessionTokenRow {
  const db = getDb();
  // Only one token is live at a time; older rows are kept for the audit trail.
  db.update(sessionTokens)
    .set({ status: 'EXPIRED' })
    .where(eq(sessionTokens.status, 'VALID'))
    .run();
  pruneSessionTokens(session.issuedAt - TOKEN_RETENTION_MS);

  return db
    .insert(sessionTokens)
    .values({
      accessToken: session.accessToken,
      refreshToken: session.refreshToken ?? null,
      issuedAt: session.issuedAt,
      expiresAt: session.expiresAt,
      status: 'VALID',
      createdAt: new Date().toISOString(),
    })
    .returning()
    .get();
}

export function getLatestValidToken(now = Date.now()): SessionTokenRow | undefined {
  const db = getDb();
  return db
    .select()
    .from(sessionTokens)
    .where(and(eq(sessionTokens.status, 'VALID'), gt(sessionTokens.expiresAt, now)))
    .orderBy(desc(sessionTokens.issuedAt))
    .limit(1)
    .get();
}

export function revokeSessionTokens(): number {
  const db = getDb();
  const result = db
    .update(sessionTokens)
    .set({ status: 'REVOKED' })
    .where(eq(sessionTokens.status, 'VALID'))
    .run();
  return result.changes;
}

/** Deletes dead rows whose expiry is before `before`. Live rows are never touched. */
export function pruneSessionTokens(before: number): number {
  const db = getDb();
  const result = db
    .delete(sessionTokens)
    .where(and(ne(sessionTokens.status, 'VALID'), lt(sessionTokens.expiresAt, before)))
    .run();
  return result.changes;
}

export function rowToSession(row: SessionTokenRow): Session {
  return {
    accessToken: row.accessToken,
    issuedAt: row.issuedAt,
    expiresAt: row.expiresAt,
    status: row.status,
    ...(row.refreshToken ? { refreshToken: row.refreshToken } : {}),
  };
}

/** Token cache backed by the session_tokens table. */
export const sqliteTokenCache: TokenCache = {
  load(now) {
    const row = getLatestValidToken(now);
    return row ? rowToSession(row) : null;
  },
  save(session) {
    saveSessionToken(session);
  },
  clear() {
    revokeSessionTokens();
  },
};
