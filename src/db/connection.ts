// ──────────────────────────────────────────
// Database connection: Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { types } from 'pg';
import { getConfig, requireDatabaseUrl } from '../platform/config';

// DATE columns stay 'YYYY-MM-DD' strings; the modeling layer turns them into UTC dates
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | undefined;

export function getDb(): Knex {
  if (!db) {
    const config = getConfig();
    db = knex({
      client: 'pg',
      connection: requireDatabaseUrl(config),
      pool: { min: config.DB_POOL_MIN, max: config.DB_POOL_MAX },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
