// ──────────────────────────────────────────
// Modeling: Date repair pass over the fact table
// ──────────────────────────────────────────

import { FactStore } from '../../shared/contracts';
import { DateRepairResult } from '../../shared/types';
import { DateParseStrategy, DEFAULT_DATE_STRATEGIES, normalizeDates } from './date-normalizer';

export class DateRepairJob {
  constructor(
    private facts: FactStore,
    private strategies: readonly DateParseStrategy[] = DEFAULT_DATE_STRATEGIES
  ) {}

  async run(): Promise<DateRepairResult> {
    const rows = await this.facts.getRawDates();
    const { updates, summary, unparseable } = normalizeDates(rows, this.strategies);

    await this.facts.setNormalizedDates(updates);

    console.log(
      `[DateRepair] ${summary.converted_rows}/${summary.total_rows} dates converted, ${summary.null_rows} left null`
    );
    if (unparseable.length > 0) {
      const sample = unparseable.slice(0, 5).map((u) => JSON.stringify(u.order_date_raw)).join(', ');
      console.warn(`[DateRepair] ${unparseable.length} distinct unparseable values, e.g. ${sample}`);
    }

    return { summary, unparseable };
  }

  /** Conversion summary and unparseable values for the rows currently stored; writes nothing. */
  async getQuality(): Promise<DateRepairResult> {
    const { summary, unparseable } = normalizeDates(await this.facts.getRawDates(), this.strategies);
    return { summary, unparseable };
  }
}
