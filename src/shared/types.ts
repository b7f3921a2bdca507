// ──────────────────────────────────────────
// Shared type definitions for the retail sales pipeline
// ──────────────────────────────────────────

export type EntityKind = 'customer' | 'product' | 'transaction';
export type BatchStatus = 'completed' | 'partial_failure';
export type RejectionReason =
  | 'invalid_row'
  | 'duplicate_key'
  | 'unknown_customer'
  | 'unknown_product';
export type CustomerType = 'New' | 'Repeat';

// ── Dimensions ──

export interface Customer {
  customer_id: string;
  customer_name: string;
  gender: string;
  age: number | null;
  city: string;
}

export interface Product {
  product_id: string;
  product_name: string;
  category: string;
  unit_price: number;
}

// ── Fact ──

/** A fact row as it is written at load time, before the date repair pass. */
export interface TransactionRecord {
  order_id: string;
  order_date_raw: string;
  customer_id: string;
  product_id: string;
  store_id: string;
  quantity: number;
  unit_price: number;
}

/**
 * A validated fact row. `total_sales` is derived from quantity and unit price
 * on every read and cannot be assigned.
 */
export interface SalesTransaction extends Readonly<TransactionRecord> {
  readonly order_date_clean: Date | null;
  readonly total_sales: number;
}

export interface RawDateRow {
  order_id: string;
  order_date_raw: string;
}

export interface NormalizedDateUpdate {
  order_id: string;
  order_date_clean: Date | null;
}

// ── Loading ──

export interface LoadSource {
  customers: string;
  products: string;
  transactions: string;
}

export interface LoadRejection {
  entity: EntityKind;
  row: number;
  key: string | null;
  reason: RejectionReason;
  message: string;
}

export interface EntityLoadCounts {
  total: number;
  accepted: number;
  rejected: number;
}

export interface LoadReport {
  batch_id: string;
  status: BatchStatus;
  customers: EntityLoadCounts;
  products: EntityLoadCounts;
  transactions: EntityLoadCounts;
  rejections: LoadRejection[];
}

export interface LoadBatch {
  id: string;
  status: BatchStatus | 'processing' | 'failed';
  customers_total: number;
  customers_accepted: number;
  products_total: number;
  products_accepted: number;
  transactions_total: number;
  transactions_accepted: number;
  rejected: number;
  created_at: Date;
  completed_at: Date | null;
  error: string | null;
}

// ── Date repair ──

export interface ConversionSummary {
  total_rows: number;
  converted_rows: number;
  null_rows: number;
  by_strategy: Record<string, number>;
}

export interface UnparseableDate {
  order_date_raw: string;
  length: number;
  rows: number;
}

export interface DateRepairResult {
  summary: ConversionSummary;
  unparseable: UnparseableDate[];
}

// ── Reports ──

export interface MonthlyRevenueRow {
  year_month: string;
  revenue: number;
}

export interface CategoryYearRevenueRow {
  category: string;
  sales_year: number;
  revenue: number;
}

export interface CustomerSegmentRow {
  customer_type: CustomerType;
  customers: number;
}

export interface TopProductRow {
  store_id: string;
  product_id: string;
  revenue: number;
  rnk: number;
}

export interface CustomerLifetimeValueRow {
  customer_id: string;
  lifetime_value: number;
}
