// ──────────────────────────────────────────
// Ingestion: Bulk load service: the single funnel
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CustomerStore, FactStore, LoadBatchLog, ProductStore } from '../../shared/contracts';
import {
  EntityKind,
  EntityLoadCounts,
  LoadRejection,
  LoadReport,
  LoadSource,
  RejectionReason,
  TransactionRecord,
} from '../../shared/types';
import { ValidationError } from '../../shared/errors';
import { CsvRecord, parseCsv } from './csv-reader';
import { customerRowSchema, productRowSchema, transactionRowSchema, validateRow } from './row-schemas';

interface Accepted<T> {
  rows: T[];
  counts: EntityLoadCounts;
}

export class LoadService {
  constructor(
    private customers: CustomerStore,
    private products: ProductStore,
    private facts: FactStore,
    private batches: LoadBatchLog
  ) {}

  /**
   * Loads customers, then products, then transactions. Rows that fail
   * validation or reference an unknown customer/product are rejected and
   * reported; everything else is written.
   */
  async load(source: LoadSource): Promise<LoadReport> {
    // Parse everything up front so an unreadable source fails before any write
    const customerRows = parseCsv(source.customers, 'customers');
    const productRows = parseCsv(source.products, 'products');
    const transactionRows = parseCsv(source.transactions, 'transactions');

    const batchId = uuidv4();
    await this.batches.start(batchId);

    try {
      const report = await this.write(batchId, customerRows, productRows, transactionRows);
      await this.batches.complete(report);

      console.log(
        `[Loader] Batch ${batchId}: ${report.customers.accepted} customers, ` +
          `${report.products.accepted} products, ${report.transactions.accepted} transactions accepted; ` +
          `${report.rejections.length} rows rejected`
      );
      return report;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Loader] Batch ${batchId} failed: ${message}`);
      await this.batches.fail(batchId, message);
      throw err;
    }
  }

  private async write(
    batchId: string,
    customerRows: CsvRecord[],
    productRows: CsvRecord[],
    transactionRows: CsvRecord[]
  ): Promise<LoadReport> {
    const rejections: LoadRejection[] = [];

    // 1. Dimensions
    const customerIds = await this.customers.getIds();
    const customers = acceptUnique('customer', customerRows, customerRowSchema, 'customer_id', customerIds, rejections);
    await this.customers.insertMany(customers.rows);

    const productIds = await this.products.getIds();
    const products = acceptUnique('product', productRows, productRowSchema, 'product_id', productIds, rejections);
    await this.products.insertMany(products.rows);

    // 2. Facts: only rows whose references resolve
    const orderIds = await this.facts.getOrderIds();
    const transactions = acceptUnique(
      'transaction',
      transactionRows,
      transactionRowSchema,
      'order_id',
      orderIds,
      rejections,
      (tx) => referenceProblem(tx, customerIds, productIds)
    );
    await this.facts.insertMany(transactions.rows);

    return {
      batch_id: batchId,
      status: rejections.length > 0 ? 'partial_failure' : 'completed',
      customers: customers.counts,
      products: products.counts,
      transactions: transactions.counts,
      rejections,
    };
  }
}

// ── Helpers ──

type KeyField<T> = { [K in keyof T]: T[K] extends string ? K : never }[keyof T];

function acceptUnique<T>(
  entity: EntityKind,
  rows: CsvRecord[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  keyField: KeyField<T> & string,
  seen: Set<string>,
  rejections: LoadRejection[],
  check?: (row: T) => { reason: RejectionReason; message: string } | null
): Accepted<T> {
  const accepted: T[] = [];

  rows.forEach(({ fields, overflow }, index) => {
    const rowNumber = index + 1;
    const rawKey = fields[keyField]?.trim() || null;

    const reject = (reason: RejectionReason, message: string) => {
      rejections.push({ entity, row: rowNumber, key: rawKey, reason, message });
      console.warn(`[Loader] Rejected ${entity} row ${rowNumber}${rawKey ? ` (${rawKey})` : ''}: ${message}`);
    };

    if (overflow.length > 0) {
      reject('invalid_row', `row has ${overflow.length} more field(s) than the header`);
      return;
    }

    let parsed: T;
    try {
      parsed = validateRow(schema, fields);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      reject('invalid_row', err.message);
      return;
    }

    const key = String(parsed[keyField]);
    if (seen.has(key)) {
      reject('duplicate_key', `${keyField} ${key} already exists`);
      return;
    }

    const problem = check?.(parsed);
    if (problem) {
      reject(problem.reason, problem.message);
      return;
    }

    seen.add(key);
    accepted.push(parsed);
  });

  return {
    rows: accepted,
    counts: { total: rows.length, accepted: accepted.length, rejected: rows.length - accepted.length },
  };
}

function referenceProblem(
  tx: TransactionRecord,
  customerIds: Set<string>,
  productIds: Set<string>
): { reason: RejectionReason; message: string } | null {
  if (!customerIds.has(tx.customer_id)) {
    return { reason: 'unknown_customer', message: `customer ${tx.customer_id} does not exist` };
  }
  if (!productIds.has(tx.product_id)) {
    return { reason: 'unknown_product', message: `product ${tx.product_id} does not exist` };
  }
  return null;
}
