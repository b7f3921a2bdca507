// ──────────────────────────────────────────
// Analytics: Aggregation views over the fact table
// ──────────────────────────────────────────
//
// Every view is a pure function of a snapshot. Revenue is summed in integer
// cents and reported in currency units.

import {
  CategoryYearRevenueRow,
  CustomerLifetimeValueRow,
  CustomerSegmentRow,
  MonthlyRevenueRow,
  Product,
  SalesTransaction,
  TopProductRow,
} from '../../shared/types';
import { fromCents, toCents } from '../../shared/money';
import { formatIsoDate } from '../modeling/date-normalizer';

export const DEFAULT_TOP_PRODUCTS = 5;

// ── Views ──

/** Revenue per calendar month, oldest first. Undated rows are skipped. */
export function monthlyRevenueTrend(facts: readonly SalesTransaction[]): MonthlyRevenueRow[] {
  const byMonth = new Map<string, number>();

  for (const fact of facts) {
    if (!fact.order_date_clean) continue;
    const key = formatIsoDate(fact.order_date_clean).slice(0, 7);
    addTo(byMonth, key, toCents(fact.total_sales));
  }

  return Array.from(byMonth.entries())
    .sort(([a], [b]) => compareText(a, b))
    .map(([yearMonth, cents]) => ({ year_month: yearMonth, revenue: fromCents(cents) }));
}

/** Revenue per (category, year), highest first. Undated rows are skipped. */
export function categoryYearRevenue(
  facts: readonly SalesTransaction[],
  products: readonly Product[]
): CategoryYearRevenueRow[] {
  const categoryOf = new Map(products.map((p) => [p.product_id, p.category]));
  const byCategory = new Map<string, Map<number, number>>();

  for (const fact of facts) {
    if (!fact.order_date_clean) continue;
    const category = categoryOf.get(fact.product_id);
    if (category === undefined) continue;

    let byYear = byCategory.get(category);
    if (!byYear) {
      byYear = new Map();
      byCategory.set(category, byYear);
    }
    addTo(byYear, fact.order_date_clean.getUTCFullYear(), toCents(fact.total_sales));
  }

  const rows: { category: string; sales_year: number; cents: number }[] = [];
  for (const [category, byYear] of byCategory) {
    for (const [year, cents] of byYear) {
      rows.push({ category, sales_year: year, cents });
    }
  }

  return rows
    .sort((a, b) => b.cents - a.cents || compareText(a.category, b.category) || a.sales_year - b.sales_year)
    .map((r) => ({ category: r.category, sales_year: r.sales_year, revenue: fromCents(r.cents) }));
}

/** New (one order) vs Repeat (more than one) customers, among customers with orders. */
export function customerSegmentation(facts: readonly SalesTransaction[]): CustomerSegmentRow[] {
  const orders = new Map<string, number>();
  for (const fact of facts) {
    addTo(orders, fact.customer_id, 1);
  }

  let repeat = 0;
  for (const count of orders.values()) {
    if (count > 1) repeat++;
  }
  const newCustomers = orders.size - repeat;

  const rows: CustomerSegmentRow[] = [];
  if (newCustomers > 0) rows.push({ customer_type: 'New', customers: newCustomers });
  if (repeat > 0) rows.push({ customer_type: 'Repeat', customers: repeat });
  return rows;
}

/**
 * Best-selling products of each store by revenue. Tied revenue shares a rank
 * and the next rank skips past the tie; ranks 1..limit are kept.
 */
export function topProductsPerStore(
  facts: readonly SalesTransaction[],
  limit: number = DEFAULT_TOP_PRODUCTS
): TopProductRow[] {
  const byStore = new Map<string, Map<string, number>>();

  for (const fact of facts) {
    let byProduct = byStore.get(fact.store_id);
    if (!byProduct) {
      byProduct = new Map();
      byStore.set(fact.store_id, byProduct);
    }
    addTo(byProduct, fact.product_id, toCents(fact.total_sales));
  }

  const rows: TopProductRow[] = [];
  const stores = Array.from(byStore.keys()).sort(compareText);

  for (const storeId of stores) {
    const products = Array.from(byStore.get(storeId) ?? new Map<string, number>(), ([productId, cents]) => ({
      productId,
      cents,
    })).sort((a, b) => b.cents - a.cents || compareText(a.productId, b.productId));

    for (const { item, rank } of rankDescending(products, (p) => p.cents)) {
      if (rank > limit) break;
      rows.push({ store_id: storeId, product_id: item.productId, revenue: fromCents(item.cents), rnk: rank });
    }
  }

  return rows;
}

/**
 * Customers whose lifetime revenue exceeds the average value of a single
 * transaction (not the average customer total), highest first.
 */
export function customerLifetimeValue(facts: readonly SalesTransaction[]): CustomerLifetimeValueRow[] {
  if (facts.length === 0) return [];

  const byCustomer = new Map<string, number>();
  let totalCents = 0;
  for (const fact of facts) {
    const cents = toCents(fact.total_sales);
    totalCents += cents;
    addTo(byCustomer, fact.customer_id, cents);
  }
  const averageTransactionCents = totalCents / facts.length;

  return Array.from(byCustomer.entries())
    .filter(([, cents]) => cents > averageTransactionCents)
    .sort(([idA, a], [idB, b]) => b - a || compareText(idA, idB))
    .map(([customerId, cents]) => ({ customer_id: customerId, lifetime_value: fromCents(cents) }));
}

// ── Helpers ──

export interface Ranked<T> {
  item: T;
  rank: number;
}

/**
 * Competition ranking ("1, 2, 2, 4") over items already sorted by measure,
 * descending.
 */
export function rankDescending<T>(sorted: readonly T[], measure: (item: T) => number): Ranked<T>[] {
  const ranked: Ranked<T>[] = [];
  sorted.forEach((item, i) => {
    const previous = ranked[i - 1];
    const rank = previous && measure(previous.item) === measure(item) ? previous.rank : i + 1;
    ranked.push({ item, rank });
  });
  return ranked;
}

function addTo<K>(map: Map<K, number>, key: K, amount: number): void {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
