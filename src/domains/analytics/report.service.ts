// ──────────────────────────────────────────
// Analytics: Report service
// ──────────────────────────────────────────

import { FactStore, ProductStore } from '../../shared/contracts';
import {
  CategoryYearRevenueRow,
  CustomerLifetimeValueRow,
  CustomerSegmentRow,
  DateRepairResult,
  MonthlyRevenueRow,
  TopProductRow,
} from '../../shared/types';
import { DateRepairJob } from '../modeling/date-repair.job';
import {
  categoryYearRevenue,
  customerLifetimeValue,
  customerSegmentation,
  DEFAULT_TOP_PRODUCTS,
  monthlyRevenueTrend,
  topProductsPerStore,
} from './aggregations';

export interface SalesReport {
  monthly_revenue: MonthlyRevenueRow[];
  category_revenue: CategoryYearRevenueRow[];
  customer_segments: CustomerSegmentRow[];
  top_products: TopProductRow[];
  customer_lifetime_value: CustomerLifetimeValueRow[];
}

export class ReportService {
  constructor(
    private facts: FactStore,
    private products: ProductStore,
    private dateRepair: DateRepairJob,
    private topProductsLimit: number = DEFAULT_TOP_PRODUCTS
  ) {}

  async getMonthlyRevenue(): Promise<MonthlyRevenueRow[]> {
    return monthlyRevenueTrend(await this.facts.getTransactions());
  }

  async getCategoryRevenue(): Promise<CategoryYearRevenueRow[]> {
    const [facts, products] = await Promise.all([this.facts.getTransactions(), this.products.findAll()]);
    return categoryYearRevenue(facts, products);
  }

  async getCustomerSegments(): Promise<CustomerSegmentRow[]> {
    return customerSegmentation(await this.facts.getTransactions());
  }

  async getTopProducts(limit: number = this.topProductsLimit): Promise<TopProductRow[]> {
    return topProductsPerStore(await this.facts.getTransactions(), limit);
  }

  async getCustomerLifetimeValue(): Promise<CustomerLifetimeValueRow[]> {
    return customerLifetimeValue(await this.facts.getTransactions());
  }

  async getDateQuality(): Promise<DateRepairResult> {
    return this.dateRepair.getQuality();
  }

  /** All five views computed from a single snapshot. */
  async getReport(): Promise<SalesReport> {
    const [facts, products] = await Promise.all([this.facts.getTransactions(), this.products.findAll()]);
    return {
      monthly_revenue: monthlyRevenueTrend(facts),
      category_revenue: categoryYearRevenue(facts, products),
      customer_segments: customerSegmentation(facts),
      top_products: topProductsPerStore(facts, this.topProductsLimit),
      customer_lifetime_value: customerLifetimeValue(facts),
    };
  }
}
