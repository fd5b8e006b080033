// ──────────────────────────────────────────
// Script: Reset — drop all tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb, migrateLatest } from '../src/db/connection';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping all tables...');

  await db.raw('DROP TABLE IF EXISTS query_cache CASCADE');
  await db.raw('DROP TABLE IF EXISTS sales CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await migrateLatest(db);

  console.log('[Reset] Done — all tables recreated');
  await closeDb();
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
