// ──────────────────────────────────────────
// Ingestion: Delimited text reader
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { LoadSource } from '../../shared/types';
import { SourceUnreadableError } from '../../shared/errors';

export type CsvRow = Record<string, string | undefined>;

export interface CsvRecord {
  fields: CsvRow;
  /** Values past the last header column. */
  overflow: string[];
}

export const SOURCE_FILES: Record<keyof LoadSource, string> = {
  customers: 'customers.csv',
  products: 'products.csv',
  transactions: 'retail_sales_data.csv',
};

/**
 * Parses CSV text with a header line. Short or long rows are kept so that row
 * validation can reject them individually; only text the tokenizer cannot
 * read at all is fatal.
 */
export function parseCsv(text: string, sourceName: string): CsvRecord[] {
  let records: string[][];
  try {
    records = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new SourceUnreadableError(sourceName, err);
  }

  const [header = [], ...body] = records;
  const columns = header.map((h) => h.toLowerCase());

  return body.map((values) => {
    const fields: CsvRow = {};
    columns.forEach((column, i) => {
      if (i < values.length) fields[column] = values[i];
    });
    return { fields, overflow: values.slice(columns.length) };
  });
}

export function readCsvFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new SourceUnreadableError(filePath, err);
  }
}

export function readLoadSource(dir: string): LoadSource {
  return {
    customers: readCsvFile(path.join(dir, SOURCE_FILES.customers)),
    products: readCsvFile(path.join(dir, SOURCE_FILES.products)),
    transactions: readCsvFile(path.join(dir, SOURCE_FILES.transactions)),
  };
}
