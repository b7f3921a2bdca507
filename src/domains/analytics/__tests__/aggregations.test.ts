import { describe, it, expect } from 'vitest';
import {
  categoryYearRevenue,
  customerLifetimeValue,
  customerSegmentation,
  monthlyRevenueTrend,
  rankDescending,
  topProductsPerStore,
} from '../index';
import { Product } from '../../../shared/types';
import { fact, utcDate } from '../../../__tests__/helpers/in-memory-stores';

// ── Monthly revenue ─────────────────────────────────────────────────

describe('monthlyRevenueTrend', () => {
  const facts = [
    fact({ order_id: 'O1', quantity: 2, unit_price: 50 }, utcDate(2024, 1, 15)),
    fact({ order_id: 'O2', quantity: 3, unit_price: 19.99 }, utcDate(2024, 1, 28)),
    fact({ order_id: 'O3', quantity: 1, unit_price: 120 }, utcDate(2023, 12, 4)),
    fact({ order_id: 'O4', quantity: 1, unit_price: 89.9 }, null),
  ];

  it('groups by year-month in chronological order', () => {
    expect(monthlyRevenueTrend(facts)).toEqual([
      { year_month: '2023-12', revenue: 120 },
      { year_month: '2024-01', revenue: 159.97 },
    ]);
  });

  it('sums to the revenue of dated transactions', () => {
    const total = monthlyRevenueTrend(facts).reduce((s, r) => s + r.revenue, 0);
    expect(total).toBeCloseTo(279.97, 10);
  });

  it('returns nothing when no row has a date', () => {
    expect(monthlyRevenueTrend([facts[3]])).toEqual([]);
    expect(monthlyRevenueTrend([])).toEqual([]);
  });
});

// ── Category by year ────────────────────────────────────────────────

describe('categoryYearRevenue', () => {
  const products: Product[] = [
    { product_id: 'P1', product_name: 'Trail Shoe', category: 'Footwear', unit_price: 50 },
    { product_id: 'P2', product_name: 'Wool Sock', category: 'Apparel', unit_price: 15 },
    { product_id: 'P3', product_name: 'Sun Hat', category: 'Apparel', unit_price: 40 },
  ];

  it('sorts by revenue, then category, then year', () => {
    const facts = [
      fact({ order_id: 'O1', product_id: 'P1', quantity: 2, unit_price: 50 }, utcDate(2024, 3, 1)),
      fact({ order_id: 'O2', product_id: 'P2', quantity: 4, unit_price: 15 }, utcDate(2024, 5, 2)),
      fact({ order_id: 'O3', product_id: 'P3', quantity: 1, unit_price: 40 }, utcDate(2024, 6, 3)),
      fact({ order_id: 'O4', product_id: 'P2', quantity: 1, unit_price: 100 }, utcDate(2023, 7, 4)),
      fact({ order_id: 'O5', product_id: 'P1', quantity: 3, unit_price: 50 }, utcDate(2023, 8, 5)),
      fact({ order_id: 'O6', product_id: 'P1', quantity: 10, unit_price: 50 }, null),
    ];

    expect(categoryYearRevenue(facts, products)).toEqual([
      { category: 'Footwear', sales_year: 2023, revenue: 150 },
      { category: 'Apparel', sales_year: 2023, revenue: 100 },
      { category: 'Apparel', sales_year: 2024, revenue: 100 },
      { category: 'Footwear', sales_year: 2024, revenue: 100 },
    ]);
  });

  it('returns nothing for an empty fact table', () => {
    expect(categoryYearRevenue([], products)).toEqual([]);
  });
});

// ── Segmentation ────────────────────────────────────────────────────

describe('customerSegmentation', () => {
  it('classifies customers with more than one order as Repeat', () => {
    const facts = [
      fact({ order_id: 'O1', customer_id: 'C1' }),
      fact({ order_id: 'O2', customer_id: 'C1' }),
      fact({ order_id: 'O3', customer_id: 'C2' }),
      fact({ order_id: 'O4', customer_id: 'C3' }),
      fact({ order_id: 'O5', customer_id: 'C3' }),
      fact({ order_id: 'O6', customer_id: 'C3' }),
    ];

    expect(customerSegmentation(facts)).toEqual([
      { customer_type: 'New', customers: 1 },
      { customer_type: 'Repeat', customers: 2 },
    ]);
  });

  it('includes undated transactions', () => {
    const facts = [fact({ order_id: 'O1', customer_id: 'C1' }), fact({ order_id: 'O2', customer_id: 'C1' })];
    expect(customerSegmentation(facts)).toEqual([{ customer_type: 'Repeat', customers: 1 }]);
  });

  it('returns nothing without orders', () => {
    expect(customerSegmentation([])).toEqual([]);
  });
});

// ── Top products per store ──────────────────────────────────────────

describe('topProductsPerStore', () => {
  const sale = (order_id: string, store_id: string, product_id: string, unit_price: number) =>
    fact({ order_id, store_id, product_id, unit_price, quantity: 1 });

  const facts = [
    sale('O1', 'S1', 'P1', 100),
    sale('O2', 'S1', 'P2', 100),
    sale('O3', 'S1', 'P3', 80),
    sale('O4', 'S1', 'P4', 80),
    sale('O5', 'S1', 'P5', 60),
    sale('O6', 'S1', 'P8', 60),
    sale('O7', 'S1', 'P6', 50),
    sale('O8', 'S1', 'P7', 40),
    sale('O9', 'S2', 'P1', 10),
    sale('O10', 'S2', 'P1', 20),
    sale('O11', 'S2', 'P9', 5),
  ];

  it('ranks with shared ranks for ties and keeps ranks 1..5', () => {
    expect(topProductsPerStore(facts)).toEqual([
      { store_id: 'S1', product_id: 'P1', revenue: 100, rnk: 1 },
      { store_id: 'S1', product_id: 'P2', revenue: 100, rnk: 1 },
      { store_id: 'S1', product_id: 'P3', revenue: 80, rnk: 3 },
      { store_id: 'S1', product_id: 'P4', revenue: 80, rnk: 3 },
      { store_id: 'S1', product_id: 'P5', revenue: 60, rnk: 5 },
      { store_id: 'S1', product_id: 'P8', revenue: 60, rnk: 5 },
      { store_id: 'S2', product_id: 'P1', revenue: 30, rnk: 1 },
      { store_id: 'S2', product_id: 'P9', revenue: 5, rnk: 2 },
    ]);
  });

  it('keeps revenue non-increasing by rank within a store', () => {
    const s1 = topProductsPerStore(facts).filter((r) => r.store_id === 'S1');
    for (let i = 1; i < s1.length; i++) {
      expect(s1[i].revenue).toBeLessThanOrEqual(s1[i - 1].revenue);
      expect(s1[i].rnk).toBeGreaterThanOrEqual(s1[i - 1].rnk);
    }
    expect(new Set(s1.map((r) => r.rnk)).size).toBeLessThanOrEqual(5);
  });

  it('honours a smaller limit', () => {
    expect(topProductsPerStore(facts, 1).map((r) => `${r.store_id}:${r.product_id}`)).toEqual([
      'S1:P1',
      'S1:P2',
      'S2:P1',
    ]);
  });

  it('returns nothing for an empty fact table', () => {
    expect(topProductsPerStore([])).toEqual([]);
  });
});

describe('rankDescending', () => {
  it('assigns competition ranks', () => {
    const ranked = rankDescending([9, 7, 7, 7, 3], (n) => n);
    expect(ranked.map((r) => r.rank)).toEqual([1, 2, 2, 2, 5]);
  });
});

// ── Lifetime value ──────────────────────────────────────────────────

describe('customerLifetimeValue', () => {
  it('keeps customers above the average transaction value', () => {
    // average transaction = (300 + 200 + 100) / 3 = 200
    const facts = [
      fact({ order_id: 'O1', customer_id: 'C1', unit_price: 300 }),
      fact({ order_id: 'O2', customer_id: 'C1', unit_price: 200 }),
      fact({ order_id: 'O3', customer_id: 'C2', unit_price: 100 }),
    ];
    expect(customerLifetimeValue(facts)).toEqual([{ customer_id: 'C1', lifetime_value: 500 }]);
  });

  it('compares against the transaction average, not the customer average', () => {
    // transaction average = 60, customer average = 150
    const facts = [
      fact({ order_id: 'O1', customer_id: 'C1', unit_price: 50 }),
      fact({ order_id: 'O2', customer_id: 'C1', unit_price: 50 }),
      fact({ order_id: 'O3', customer_id: 'C1', unit_price: 50 }),
      fact({ order_id: 'O4', customer_id: 'C1', unit_price: 50 }),
      fact({ order_id: 'O5', customer_id: 'C2', unit_price: 100 }),
    ];
    expect(customerLifetimeValue(facts)).toEqual([
      { customer_id: 'C1', lifetime_value: 200 },
      { customer_id: 'C2', lifetime_value: 100 },
    ]);
  });

  it('breaks ties by customer id and excludes totals equal to the average', () => {
    const facts = [
      fact({ order_id: 'O1', customer_id: 'C3', unit_price: 250 }),
      fact({ order_id: 'O2', customer_id: 'C3', unit_price: 250 }),
      fact({ order_id: 'O3', customer_id: 'C1', unit_price: 500 }),
      fact({ order_id: 'O4', customer_id: 'C2', unit_price: 250 }),
    ];
    // average = 1250 / 4 = 312.5
    expect(customerLifetimeValue(facts)).toEqual([
      { customer_id: 'C1', lifetime_value: 500 },
      { customer_id: 'C3', lifetime_value: 500 },
    ]);

    const flat = [fact({ order_id: 'O1', customer_id: 'C1' }), fact({ order_id: 'O2', customer_id: 'C2' })];
    expect(customerLifetimeValue(flat)).toEqual([]);
  });

  it('returns nothing for an empty fact table', () => {
    expect(customerLifetimeValue([])).toEqual([]);
  });
});

// ── Derived totals ──────────────────────────────────────────────────

describe('total_sales', () => {
  it('is always quantity × unit price', () => {
    const cases: [number, number, number][] = [
      [2, 50, 100],
      [3, 19.99, 59.97],
      [7, 0.1, 0.7],
      [1, 0, 0],
    ];
    for (const [quantity, unit_price, expected] of cases) {
      expect(fact({ order_id: 'O', quantity, unit_price }).total_sales).toBe(expected);
    }
  });
});
