// ──────────────────────────────────────────
// Script: Seed — push 90 days of mock point-of-sale rows
// through the ingestion pipeline
//
// Usage:
//   npm run seed -- [--rows 1000] [--days 90]
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { faker } from '@faker-js/faker';
import { getDb, closeDb, migrateLatest } from '../src/db/connection';
import { SalesRepo } from '../src/domains/ledger/sales.repo';
import { QueryCache, MemoryCacheStore } from '../src/domains/analytics';
import { IngestionService } from '../src/domains/ingestion';
import { RawSaleRecord } from '../src/shared/types';

const BRANCHES = [
  { branch: 'A', city: 'Yangon' },
  { branch: 'B', city: 'Mandalay' },
  { branch: 'C', city: 'Naypyitaw' },
];
const PRODUCT_LINES = [
  'Health and beauty',
  'Electronic accessories',
  'Home and lifestyle',
  'Sports and travel',
  'Food and beverages',
  'Fashion accessories',
];
const PAYMENTS = ['Cash', 'Credit card', 'Ewallet'];
const GROSS_MARGIN_PCT = 4.761904762;

function argValue(flag: string, fallback: number): number {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return fallback;
  const value = parseInt(process.argv[idx + 1] ?? '', 10);
  return Number.isNaN(value) ? fallback : value;
}

function generateRows(count: number, days: number, now = new Date()): RawSaleRecord[] {
  const rows: RawSaleRecord[] = [];

  for (let i = 0; i < count; i++) {
    const date = new Date(now);
    date.setUTCDate(date.getUTCDate() - faker.number.int({ min: 0, max: days - 1 }));
    const { branch, city } = faker.helpers.arrayElement(BRANCHES);

    // Raw export spelling on purpose: the validator normalizes headers
    rows.push({
      'Invoice ID': `${faker.string.numeric(3)}-${faker.string.numeric(2)}-${faker.string.numeric(4)}-${i}`,
      Branch: branch,
      City: city,
      'Customer type': faker.helpers.arrayElement(['Member', 'Normal']),
      Gender: faker.helpers.arrayElement(['Female', 'Male']),
      'Product line': faker.helpers.arrayElement(PRODUCT_LINES),
      'Unit price': faker.commerce.price({ min: 10, max: 100 }),
      Quantity: faker.number.int({ min: 1, max: 10 }),
      Date: `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${date.getUTCFullYear()}`,
      Time: `${faker.number.int({ min: 10, max: 20 })}:${String(faker.number.int({ min: 0, max: 59 })).padStart(2, '0')}`,
      Payment: faker.helpers.arrayElement(PAYMENTS),
      'gross margin percentage': GROSS_MARGIN_PCT,
      Rating: faker.number.float({ min: 4, max: 10, precision: 0.1 }),
    });
  }

  return rows;
}

async function seed() {
  const db = getDb();
  console.log('[Seed] Starting...');

  console.log('[Seed] Running migrations...');
  await migrateLatest(db);

  console.log('[Seed] Clearing existing data...');
  await db.raw('TRUNCATE TABLE sales, query_cache RESTART IDENTITY');

  const rows = generateRows(argValue('--rows', 1000), argValue('--days', 90));
  const ingestion = new IngestionService(new SalesRepo(db), new QueryCache(new MemoryCacheStore()));
  const report = await ingestion.ingest(rows);

  console.log(`[Seed] Inserted ${report.inserted} sales (${report.rejected.length} rejected)`);
  await closeDb();
}

seed().catch((err) => {
  console.error('[Seed] Error:', err);
  process.exit(1);
});
