import { and, desc, eq, gte, lt } from 'drizzle-orm';
import type { LoginStage, SessionStatusEvent } from '../auth/types.js';
import { formatStatusEvent } from '../auth/types.js';
import { getDb } from '../db/index.js';
import { auditLog } from '../db/schema.js';
import { safeJsonParse } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('audit-log');

export const AUDIT_EVENT_TYPES = [
  'session',
  'login',
  'config',
  'error',
  'control',
] as const;
export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];
export type AuditCategory = 'auth' | 'system' | 'user';
export type AuditSeverity = 'info' | 'warn' | 'error';

export interface AuditEntry {
  id: number;
  timestamp: string;
  eventType: AuditEventType;
  category: AuditCategory;
  stage: LoginStage | null;
  summary: string;
  details: Record<string, unknown> | null;
  severity: AuditSeverity;
}

export function isAuditEventType(value: string): value is AuditEventType {
  return AUDIT_EVENT_TYPES.some((t) => t === value);
}

function statusSeverity(event: SessionStatusEvent): AuditSeverity {
  if (event.type === 'FAILED') return 'error';
  if (event.type === 'AUTHENTICATING' || event.type === 'VALID') return 'info';
  return 'warn';
}

export class AuditLogger {
  log(params: {
    eventType: AuditEventType;
    category: AuditCategory;
    stage?: LoginStage;
    summary: string;
    details?: Record<string, unknown>;
    severity?: AuditSeverity;
  }): void {
    try {
      const db = getDb();
      db.insert(auditLog)
        .values({
          timestamp: new Date().toISOString(),
          eventType: params.eventType,
          category: params.category,
          stage: params.stage ?? null,
          summary: params.summary,
          details: params.details ? JSON.stringify(params.details) : null,
          severity: params.severity ?? 'info',
        })
        .run();
    } catch (err) {
      log.error({ err }, 'Failed to write audit log');
    }
  }

  logStatusEvent(event: SessionStatusEvent): void {
    const details: Record<string, unknown> = { at: new Date(event.at).toISOString() };
    if (event.expiresAt !== undefined) details.expiresAt = new Date(event.expiresAt).toISOString();
    if (event.reason !== undefined) details.reason = event.reason;
    this.log({
      eventType: 'session',
      category: 'auth',
      summary: formatStatusEvent(event),
      details,
      severity: statusSeverity(event),
    });
  }

  logLoginAttempt(
    stage: LoginStage,
    summary: string,
    failed: boolean,
    details?: Record<string, unknown>,
  ): void {
    this.log({
      eventType: 'login',
      category: 'auth',
      stage,
      summary,
      details,
      severity: failed ? 'warn' : 'info',
    });
  }

  logConfig(summary: string, details?: Record<string, unknown>): void {
    this.log({ eventType: 'config', category: 'system', summary, details });
  }

  logError(summary: string, details?: Record<string, unknown>): void {
    this.log({ eventType: 'error', category: 'system', summary, details, severity: 'error' });
  }

  logControl(summary: string, details?: Record<string, unknown>): void {
    this.log({ eventType: 'control', category: 'user', summary, details });
  }

  /** Entries for one UTC day, newest first */
  getEntriesForDate(dateStr: string): AuditEntry[] {
    const nextDay = new Date(`${dateStr}T00:00:00.000Z`);
    nextDay.setUTCDate(nextDay.getUTCDate() + 1);

    const db = getDb();
    return db
      .select()
      .from(auditLog)
      .where(
        and(gte(auditLog.timestamp, `${dateStr}T00:00:00`), lt(auditLog.timestamp, nextDay.toISOString())),
      )
      .orderBy(desc(auditLog.timestamp), desc(auditLog.id))
      .all()
      .map((r) => this.rowToEntry(r));
  }

  getRecent(limit = 100): AuditEntry[] {
    const db = getDb();
    const rows = db
      .select()
      .from(auditLog)
      .orderBy(desc(auditLog.timestamp), desc(auditLog.id))
      .limit(limit)
      .all();

    return rows.map((r) => this.rowToEntry(r));
  }

  getByType(eventType: AuditEventType, limit = 50): AuditEntry[] {
    const db = getDb();
    const rows = db
      .select()
      .from(auditLog)
      .where(eq(auditLog.eventType, eventType))
      .orderBy(desc(auditLog.timestamp), desc(auditLog.id))
      .limit(limit)
      .all();

    return rows.map((r) => this.rowToEntry(r));
  }

  /** Plain-text digest of a day's session activity */
  generateDailyReport(dateStr: string): string {
    const entries = this.getEntriesForDate(dateStr);

    const sessions = entries.filter((e) => e.eventType === 'session');
    const logins = entries.filter((e) => e.eventType === 'login');
    const errors = entries.filter((e) => e.severity === 'error');

    const lines = [
      `Session Activity Report: ${dateStr}`,
      '='.repeat(40),
      `Total Events: ${entries.length}`,
      `Status Changes: ${sessions.length}`,
      `Login Attempts: ${logins.length}`,
      `Errors: ${errors.length}`,
      '',
    ];

    if (errors.length > 0) {
      lines.push('Errors:');
      for (const e of errors) {
        lines.push(`  ${e.timestamp.split('T')[1]?.split('.')[0] ?? ''} ${e.summary}`);
      }
    }

    return lines.join('\n');
  }

  private rowToEntry(row: typeof auditLog.$inferSelect): AuditEntry {
    return {
      id: row.id,
      timestamp: row.timestamp,
      eventType: row.eventType,
      category: row.category,
      stage: row.stage,
      summary: row.summary,
      details: row.details ? safeJsonParse<Record<string, unknown>>(row.details, {}) : null,
      severity: row.severity,
    };
  }
}

let _auditLogger: AuditLogger | null = null;

export function getAuditLogger(): AuditLogger {
  if (!_auditLogger) {
    _auditLogger = new AuditLogger();
  }
  return _auditLogger;
}
