// ──────────────────────────────────────────
// Migration: create all tables
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Ledger ──

  await knex.schema.createTable('sales', (t) => {
    t.increments('id').primary();
    t.string('invoice_id', 50).unique().notNullable();
    t.string('branch', 50).notNullable();
    t.string('city', 100).notNullable();
    t.string('customer_type', 50).notNullable();
    t.string('gender', 20).notNullable();
    t.string('product_line', 100).notNullable();
    t.double('unit_price').notNullable();
    t.integer('quantity').notNullable();
    t.double('total').notNullable();
    t.date('date').notNullable();
    t.string('time', 5);
    t.string('payment', 50).notNullable();
    t.double('cogs').notNullable();
    t.double('gross_margin_percentage').notNullable();
    t.double('gross_income').notNullable();
    t.double('rating');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    ALTER TABLE sales
      ADD CONSTRAINT sales_unit_price_nonneg CHECK (unit_price >= 0),
      ADD CONSTRAINT sales_quantity_positive CHECK (quantity >= 1),
      ADD CONSTRAINT sales_total_nonneg CHECK (total >= 0),
      ADD CONSTRAINT sales_rating_range CHECK (rating IS NULL OR rating BETWEEN 0 AND 10);
  `);

  await knex.schema.raw(`
    CREATE INDEX idx_sales_date ON sales ("date");
  `);

  // ── Query cache ──

  await knex.schema.createTable('query_cache', (t) => {
    t.string('cache_key', 255).primary();
    t.text('value').notNullable();
    t.timestamp('expires_at', { useTz: true }).notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('query_cache');
  await knex.schema.dropTableIfExists('sales');
}
