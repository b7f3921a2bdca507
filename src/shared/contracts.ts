// ──────────────────────────────────────────
// Domain contracts: typed interfaces between domains
// ──────────────────────────────────────────

import {
  Customer,
  Product,
  TransactionRecord,
  SalesTransaction,
  RawDateRow,
  NormalizedDateUpdate,
  LoadBatch,
  LoadReport,
} from './types';

/**
 * Customer dimension: written by Ingestion.
 */
export interface CustomerStore {
  insertMany(customers: Customer[]): Promise<number>;
  getIds(): Promise<Set<string>>;
}

/**
 * Product dimension: written by Ingestion, read by Analytics for joins.
 */
export interface ProductStore {
  insertMany(products: Product[]): Promise<number>;
  getIds(): Promise<Set<string>>;
  findAll(): Promise<Product[]>;
}

/**
 * Fact table: written by Ingestion, repaired by Modeling, read by Analytics.
 */
export interface FactStore {
  insertMany(rows: TransactionRecord[]): Promise<number>;
  getOrderIds(): Promise<Set<string>>;
  getRawDates(): Promise<RawDateRow[]>;
  setNormalizedDates(updates: NormalizedDateUpdate[]): Promise<void>;
  getTransactions(): Promise<SalesTransaction[]>;
}

/**
 * Load batch bookkeeping: one record per bulk load.
 */
export interface LoadBatchLog {
  start(batchId: string): Promise<void>;
  complete(report: LoadReport): Promise<void>;
  fail(batchId: string, error: string): Promise<void>;
  findById(batchId: string): Promise<LoadBatch | null>;
}
