// ──────────────────────────────────────────
// Modeling: Date normalizer
// ──────────────────────────────────────────
//
// Raw order dates arrive in mixed formats. Each value is tried against an
// ordered list of strategies; the first one that yields a real calendar date
// wins. Nothing is guessed: a value no strategy accepts stays null.

import {
  ConversionSummary,
  NormalizedDateUpdate,
  RawDateRow,
  UnparseableDate,
} from '../../shared/types';

export interface DateParts {
  year: number;
  month: number;
  day: number;
}

export interface DateParseStrategy {
  name: string;
  pattern: RegExp;
  toParts(match: RegExpMatchArray): DateParts;
}

export type DateFailureReason = 'empty' | 'unrecognized_format' | 'invalid_calendar_date';

export type NormalizedDate =
  | { ok: true; date: Date; strategy: string }
  | { ok: false; reason: DateFailureReason };

export const isoDateStrategy: DateParseStrategy = {
  name: 'iso',
  pattern: /^(\d{4})-(\d{2})-(\d{2})$/,
  toParts: (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
};

// dd-mm-yyyy, the European "style 105" export format
export const dayMonthYearStrategy: DateParseStrategy = {
  name: 'day-month-year',
  pattern: /^(\d{2})-(\d{2})-(\d{4})$/,
  toParts: (m) => ({ year: Number(m[3]), month: Number(m[2]), day: Number(m[1]) }),
};

export const DEFAULT_DATE_STRATEGIES: readonly DateParseStrategy[] = [
  isoDateStrategy,
  dayMonthYearStrategy,
];

export function normalizeDate(
  raw: string | null | undefined,
  strategies: readonly DateParseStrategy[] = DEFAULT_DATE_STRATEGIES
): NormalizedDate {
  const value = (raw ?? '').trim();
  if (value === '') return { ok: false, reason: 'empty' };

  let shapeMatched = false;
  for (const strategy of strategies) {
    const match = value.match(strategy.pattern);
    if (!match) continue;
    shapeMatched = true;

    const date = toCalendarDate(strategy.toParts(match));
    if (date) return { ok: true, date, strategy: strategy.name };
  }

  return { ok: false, reason: shapeMatched ? 'invalid_calendar_date' : 'unrecognized_format' };
}

export interface NormalizeDatesResult {
  updates: NormalizedDateUpdate[];
  summary: ConversionSummary;
  unparseable: UnparseableDate[];
}

export function normalizeDates(
  rows: RawDateRow[],
  strategies: readonly DateParseStrategy[] = DEFAULT_DATE_STRATEGIES
): NormalizeDatesResult {
  const updates: NormalizedDateUpdate[] = [];
  const byStrategy: Record<string, number> = {};
  for (const s of strategies) byStrategy[s.name] = 0;

  const failed = new Map<string, number>();
  let converted = 0;

  for (const row of rows) {
    const result = normalizeDate(row.order_date_raw, strategies);
    if (result.ok) {
      converted++;
      byStrategy[result.strategy] = (byStrategy[result.strategy] ?? 0) + 1;
      updates.push({ order_id: row.order_id, order_date_clean: result.date });
    } else {
      failed.set(row.order_date_raw, (failed.get(row.order_date_raw) ?? 0) + 1);
      updates.push({ order_id: row.order_id, order_date_clean: null });
    }
  }

  const unparseable = Array.from(failed.entries())
    .map(([value, count]) => ({ order_date_raw: value, length: value.length, rows: count }))
    .sort((a, b) => b.rows - a.rows || a.order_date_raw.localeCompare(b.order_date_raw));

  return {
    updates,
    summary: {
      total_rows: rows.length,
      converted_rows: converted,
      null_rows: rows.length - converted,
      by_strategy: byStrategy,
    },
    unparseable,
  };
}

/** Formats a normalized date as 'YYYY-MM-DD'. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Reads a date column value back; anything that is not a valid ISO date is null. */
export function parseStoredDate(value: string | null | undefined): Date | null {
  const result = normalizeDate(value, [isoDateStrategy]);
  return result.ok ? result.date : null;
}

function toCalendarDate({ year, month, day }: DateParts): Date | null {
  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  // setUTCFullYear keeps years below 100 literal instead of mapping them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
