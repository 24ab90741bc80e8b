import { eq } from 'drizzle-orm';
import { getDb } from '../index.js';
import { config } from '../schema.js';

export type ConfigRow = typeof config.$inferSelect;

export function getConfigRow(key: string): ConfigRow | undefined {
  return getDb().select().from(config).where(eq(config.key, key)).get();
}

export function getAllConfigRows(): ConfigRow[] {
  return getDb().select().from(config).all();
}

/** Inserts the row unless the key exists. Returns true when a row was written. */
export function insertConfigIfMissing(row: Omit<ConfigRow, 'updatedAt'>): boolean {
  const result = getDb()
    .insert(config)
    .values({ ...row, updatedAt: new Date().toISOString() })
    .onConflictDoNothing({ target: config.key })
    .run();
  return result.changes > 0;
}

export function upsertConfigValue(
  key: string,
  serialized: string,
  category: string,
  description: string | null,
): void {
  const updatedAt = new Date().toISOString();
  getDb()
    .insert(config)
    .values({ key, value: serialized, category, description, updatedAt })
    .onConflictDoUpdate({ target: config.key, set: { value: serialized, updatedAt } })
    .run();
}
