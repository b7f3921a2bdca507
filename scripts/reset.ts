// ──────────────────────────────────────────
// Script: Reset: drop all tables and re-run migrations
// ──────────────────────────────────────────

import { getDb, closeDb } from '../src/db/connection';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping all tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS load_batches CASCADE');
  await db.raw('DROP TABLE IF EXISTS sales_transactions CASCADE');
  await db.raw('DROP TABLE IF EXISTS products CASCADE');
  await db.raw('DROP TABLE IF EXISTS customers CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await db.migrate.latest({
    directory: __dirname + '/../src/db/migrations',
    extension: 'ts',
  });

  console.log('[Reset] Done: all tables recreated');
  await closeDb();
}

reset().catch(async (err) => {
  console.error('[Reset] Error:', err);
  await closeDb();
  process.exit(1);
});
