// ──────────────────────────────────────────
// Modeling: Sales transaction model repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { FactStore } from '../../../shared/contracts';
import {
  NormalizedDateUpdate,
  RawDateRow,
  SalesTransaction,
  TransactionRecord,
} from '../../../shared/types';
import { formatIsoDate } from '../date-normalizer';
import { SalesTransactionRow, TransactionTransformer } from '../transformers/transaction.transformer';

const INSERT_CHUNK = 500;

export class TransactionModel implements FactStore {
  private transformer = new TransactionTransformer();

  constructor(private db: Knex) {}

  async insertMany(rows: TransactionRecord[]): Promise<number> {
    if (rows.length === 0) return 0;
    // total_sales is a generated column and is never written
    await this.db.batchInsert('sales_transactions', rows, INSERT_CHUNK);
    return rows.length;
  }

  async getOrderIds(): Promise<Set<string>> {
    const rows: Pick<RawDateRow, 'order_id'>[] = await this.db('sales_transactions').select('order_id');
    return new Set(rows.map((r) => r.order_id));
  }

  async getRawDates(): Promise<RawDateRow[]> {
    return this.db('sales_transactions')
      .select('order_id', 'order_date_raw')
      .orderBy('order_id', 'asc');
  }

  async setNormalizedDates(updates: NormalizedDateUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    await this.db.transaction(async (trx) => {
      for (const u of updates) {
        await trx('sales_transactions')
          .where('order_id', u.order_id)
          .update({ order_date_clean: u.order_date_clean ? formatIsoDate(u.order_date_clean) : null });
      }
    });
  }

  async getTransactions(): Promise<SalesTransaction[]> {
    const rows: SalesTransactionRow[] = await this.db('sales_transactions')
      .select(
        'order_id',
        'order_date_raw',
        'order_date_clean',
        'customer_id',
        'product_id',
        'store_id',
        'quantity',
        'unit_price'
      )
      .orderBy('order_id', 'asc');
    return rows.map((r) => this.transformer.fromRow(r));
  }
}
