// ──────────────────────────────────────────
// Modeling: Sales transaction transformer
// ──────────────────────────────────────────

import { SalesTransaction, TransactionRecord } from '../../../shared/types';
import { lineTotal } from '../../../shared/money';
import { parseStoredDate } from '../date-normalizer';

/** Row shape returned by the database driver (numerics arrive as strings). */
export interface SalesTransactionRow {
  order_id: string;
  order_date_raw: string;
  order_date_clean: string | null;
  customer_id: string;
  product_id: string;
  store_id: string;
  quantity: number | string;
  unit_price: number | string;
}

export class TransactionTransformer {
  transform(record: TransactionRecord, orderDateClean: Date | null): SalesTransaction {
    const fact = {
      order_id: record.order_id,
      order_date_raw: record.order_date_raw,
      order_date_clean: orderDateClean,
      customer_id: record.customer_id,
      product_id: record.product_id,
      store_id: record.store_id,
      quantity: record.quantity,
      unit_price: record.unit_price,
      get total_sales(): number {
        return lineTotal(this.quantity, this.unit_price);
      },
    };
    return Object.freeze(fact);
  }

  fromRow(row: SalesTransactionRow): SalesTransaction {
    return this.transform(
      {
        order_id: row.order_id,
        order_date_raw: row.order_date_raw,
        customer_id: row.customer_id,
        product_id: row.product_id,
        store_id: row.store_id,
        quantity: Number(row.quantity),
        unit_price: Number(row.unit_price),
      },
      parseStoredDate(row.order_date_clean)
    );
  }
}
