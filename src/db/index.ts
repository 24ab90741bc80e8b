import { mkdirSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname } from 'node:path';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const require = createRequire(import.meta.url);
const Database: typeof import('better-sqlite3') = require('better-sqlite3');

const log = createLogger('database');

let db: ReturnType<typeof drizzle<typeof schema>>;

export function getDb() {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function initDatabase(dbPath?: string): ReturnType<typeof drizzle<typeof schema>> {
  const resolvedPath = dbPath || process.env.DB_PATH || './data/session.db';
  log.info({ path: resolvedPath }, 'Initializing database');

  if (resolvedPath !== ':memory:') {
    mkdirSync(dirname(resolvedPath), { recursive: true });
  }

  const sqlite = new Database(resolvedPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('synchronous = NORMAL');

  db = drizzle(sqlite, { schema });

  createTables(sqlite);

  log.info('Database initialized with WAL mode');
  return db;
}

function createTables(sqlite: InstanceType<typeof Database>) {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS config (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      category TEXT NOT NULL,
      description TEXT,
      updatedAt TEXT DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS session_tokens (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      accessToken TEXT NOT NULL,
      refreshToken TEXT,
      issuedAt INTEGER NOT NULL,
      expiresAt INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'VALID' CHECK(status IN ('VALID','EXPIRED','REVOKED')),
      createdAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_session_tokens_expiry ON session_tokens(status, expiresAt);

    CREATE TABLE IF NOT EXISTS audit_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      eventType TEXT NOT NULL,
      category TEXT NOT NULL,
      stage TEXT,
      summary TEXT NOT NULL,
      details TEXT,
      severity TEXT NOT NULL DEFAULT 'info'
    );
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp, eventType);
  `);

  log.debug('All tables created/verified');
}
