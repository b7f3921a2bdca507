import { CustomerStore, FactStore, LoadBatchLog, ProductStore } from '../../shared/contracts';
import {
  Customer,
  LoadBatch,
  LoadReport,
  NormalizedDateUpdate,
  Product,
  RawDateRow,
  SalesTransaction,
  TransactionRecord,
} from '../../shared/types';
import { TransactionTransformer } from '../../domains/modeling/transformers/transaction.transformer';

export class InMemoryCustomerStore implements CustomerStore {
  readonly rows = new Map<string, Customer>();

  async insertMany(customers: Customer[]): Promise<number> {
    for (const c of customers) this.rows.set(c.customer_id, c);
    return customers.length;
  }

  async getIds(): Promise<Set<string>> {
    return new Set(this.rows.keys());
  }
}

export class InMemoryProductStore implements ProductStore {
  readonly rows = new Map<string, Product>();

  async insertMany(products: Product[]): Promise<number> {
    for (const p of products) this.rows.set(p.product_id, p);
    return products.length;
  }

  async getIds(): Promise<Set<string>> {
    return new Set(this.rows.keys());
  }

  async findAll(): Promise<Product[]> {
    return Array.from(this.rows.values());
  }
}

export class InMemoryFactStore implements FactStore {
  readonly records = new Map<string, TransactionRecord>();
  readonly cleanDates = new Map<string, Date | null>();
  private transformer = new TransactionTransformer();

  async insertMany(rows: TransactionRecord[]): Promise<number> {
    for (const r of rows) {
      this.records.set(r.order_id, r);
      this.cleanDates.set(r.order_id, null);
    }
    return rows.length;
  }

  async getOrderIds(): Promise<Set<string>> {
    return new Set(this.records.keys());
  }

  async getRawDates(): Promise<RawDateRow[]> {
    return Array.from(this.records.values(), (r) => ({ order_id: r.order_id, order_date_raw: r.order_date_raw }));
  }

  async setNormalizedDates(updates: NormalizedDateUpdate[]): Promise<void> {
    for (const u of updates) this.cleanDates.set(u.order_id, u.order_date_clean);
  }

  async getTransactions(): Promise<SalesTransaction[]> {
    return Array.from(this.records.values(), (r) =>
      this.transformer.transform(r, this.cleanDates.get(r.order_id) ?? null)
    );
  }
}

export class InMemoryLoadBatchLog implements LoadBatchLog {
  readonly batches = new Map<string, LoadBatch>();

  async start(batchId: string): Promise<void> {
    this.batches.set(batchId, {
      id: batchId,
      status: 'processing',
      customers_total: 0,
      customers_accepted: 0,
      products_total: 0,
      products_accepted: 0,
      transactions_total: 0,
      transactions_accepted: 0,
      rejected: 0,
      created_at: new Date(),
      completed_at: null,
      error: null,
    });
  }

  async complete(report: LoadReport): Promise<void> {
    const batch = this.batches.get(report.batch_id);
    if (!batch) throw new Error(`Unknown batch ${report.batch_id}`);
    this.batches.set(report.batch_id, {
      ...batch,
      status: report.status,
      customers_total: report.customers.total,
      customers_accepted: report.customers.accepted,
      products_total: report.products.total,
      products_accepted: report.products.accepted,
      transactions_total: report.transactions.total,
      transactions_accepted: report.transactions.accepted,
      rejected: report.rejections.length,
      completed_at: new Date(),
    });
  }

  async fail(batchId: string, error: string): Promise<void> {
    const batch = this.batches.get(batchId);
    if (!batch) throw new Error(`Unknown batch ${batchId}`);
    this.batches.set(batchId, { ...batch, status: 'failed', error, completed_at: new Date() });
  }

  async findById(batchId: string): Promise<LoadBatch | null> {
    return this.batches.get(batchId) ?? null;
  }
}

export function createStores() {
  return {
    customers: new InMemoryCustomerStore(),
    products: new InMemoryProductStore(),
    facts: new InMemoryFactStore(),
    batches: new InMemoryLoadBatchLog(),
  };
}

/** Builds a fact directly, for aggregation tests that skip loading. */
export function fact(
  overrides: Partial<TransactionRecord> & { order_id: string },
  orderDateClean: Date | null = null
): SalesTransaction {
  return new TransactionTransformer().transform(
    {
      order_date_raw: '',
      customer_id: 'C1',
      product_id: 'P1',
      store_id: 'S1',
      quantity: 1,
      unit_price: 10,
      ...overrides,
    },
    orderDateClean
  );
}

export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}
