import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { LOGIN_STAGES } from '../auth/types.js';

export const config = sqliteTable('config', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  category: text('category').notNull(),
  description: text('description'),
  updatedAt: text('updatedAt').default('CURRENT_TIMESTAMP'),
});

// ── Session tokens (survive restarts until the broker cutoff) ───────────
export const sessionTokens = sqliteTable(
  'session_tokens',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    accessToken: text('accessToken').notNull(),
    refreshToken: text('refreshToken'),
    issuedAt: integer('issuedAt').notNull(), // epoch ms
    expiresAt: integer('expiresAt').notNull(), // epoch ms
    status: text('status', { enum: ['VALID', 'EXPIRED', 'REVOKED'] })
      .notNull()
      .default('VALID'),
    createdAt: text('createdAt').notNull(),
  },
  (table) => [index('idx_session_tokens_expiry').on(table.status, table.expiresAt)],
);

// ── Audit log (session lifecycle replay) ────────────────────────────────
export const auditLog = sqliteTable(
  'audit_log',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: text('timestamp').notNull(),
    eventType: text('eventType', {
      enum: ['session', 'login', 'config', 'error', 'control'],
    }).notNull(),
    category: text('category', { enum: ['auth', 'system', 'user'] }).notNull(),
    stage: text('stage', { enum: LOGIN_STAGES }),
    summary: text('summary').notNull(),
    details: text('details'), // JSON with full context
    severity: text('severity', { enum: ['info', 'warn', 'error'] })
      .notNull()
      .default('info'),
  },
  (table) => [index('idx_audit_ts').on(table.timestamp, table.eventType)],
);
