// ──────────────────────────────────────────
// Migration: create all tables
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Dimension tables ──

  await knex.schema.createTable('customers', (t) => {
    t.string('customer_id', 10).primary();
    t.string('customer_name', 100).notNullable();
    t.string('gender', 10).notNullable().defaultTo('');
    t.integer('age');
    t.string('city', 50).notNullable().defaultTo('');
  });

  await knex.schema.createTable('products', (t) => {
    t.string('product_id', 10).primary();
    t.string('product_name', 100).notNullable();
    t.string('category', 50).notNullable();
    t.decimal('unit_price', 10, 2).notNullable();
  });

  // ── Fact table ──

  await knex.schema.createTable('sales_transactions', (t) => {
    t.string('order_id', 20).primary();
    t.text('order_date_raw').notNullable().defaultTo('');
    t.date('order_date_clean');
    t.string('customer_id', 10).notNullable().references('customer_id').inTable('customers');
    t.string('product_id', 10).notNullable().references('product_id').inTable('products');
    t.string('store_id', 10).notNullable();
    t.integer('quantity').notNullable();
    t.decimal('unit_price', 10, 2).notNullable();
    t.specificType('total_sales', 'numeric(12,2) GENERATED ALWAYS AS (quantity * unit_price) STORED');
  });

  await knex.schema.raw(`
    CREATE INDEX idx_sales_transactions_customer ON sales_transactions (customer_id);
    CREATE INDEX idx_sales_transactions_store_product ON sales_transactions (store_id, product_id);
    CREATE INDEX idx_sales_transactions_unrepaired ON sales_transactions (order_id) WHERE order_date_clean IS NULL;
  `);

  // ── Load bookkeeping ──

  await knex.schema.createTable('load_batches', (t) => {
    t.uuid('id').primary();
    t.string('status', 20).notNullable().defaultTo('processing');
    t.integer('customers_total').notNullable().defaultTo(0);
    t.integer('customers_accepted').notNullable().defaultTo(0);
    t.integer('products_total').notNullable().defaultTo(0);
    t.integer('products_accepted').notNullable().defaultTo(0);
    t.integer('transactions_total').notNullable().defaultTo(0);
    t.integer('transactions_accepted').notNullable().defaultTo(0);
    t.integer('rejected').notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('completed_at', { useTz: true });
    t.text('error');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('load_batches');
  await knex.schema.dropTableIfExists('sales_transactions');
  await knex.schema.dropTableIfExists('products');
  await knex.schema.dropTableIfExists('customers');
}
