// ──────────────────────────────────────────
// Ingestion: Row validation schemas
// ──────────────────────────────────────────

import { z } from 'zod';
import { Customer, Product, TransactionRecord } from '../../shared/types';
import { ValidationError } from '../../shared/errors';
import { fromCents, toCents } from '../../shared/money';
import { CsvRow } from './csv-reader';

const present = () => z.string({ required_error: 'is required' });
const requiredText = (max: number) => present().trim().min(1, 'is required').max(max);
const optionalText = (max: number) => z.string().trim().max(max).optional().default('');

// Column limits: integer quantity, decimal(10,2) price, numeric(12,2) line total
export const MAX_QUANTITY = 2147483647;
export const MAX_UNIT_PRICE_CENTS = 9999999999;
export const MAX_LINE_TOTAL_CENTS = 999999999999;

const WHOLE_NUMBER = /^\d+$/;
const AMOUNT = /^\d+(\.\d{1,2})?$/;

const optionalAge = z
  .string()
  .trim()
  .optional()
  .transform((value, ctx) => {
    if (!value) return null;
    const age = WHOLE_NUMBER.test(value) ? Number(value) : NaN;
    if (!(age >= 0 && age <= 150)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a whole number between 0 and 150' });
      return z.NEVER;
    }
    return age;
  });

const money = present()
  .trim()
  .min(1, 'is required')
  .transform((value, ctx) => {
    if (!AMOUNT.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a non-negative amount with at most two decimals' });
      return z.NEVER;
    }
    const amount = Number(value);
    if (toCents(amount) > MAX_UNIT_PRICE_CENTS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must not exceed ${fromCents(MAX_UNIT_PRICE_CENTS)}` });
      return z.NEVER;
    }
    return amount;
  });

const quantity = present()
  .trim()
  .min(1, 'is required')
  .transform((value, ctx) => {
    const n = WHOLE_NUMBER.test(value) ? Number(value) : 0;
    if (n < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a positive whole number' });
      return z.NEVER;
    }
    if (n > MAX_QUANTITY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must not exceed ${MAX_QUANTITY}` });
      return z.NEVER;
    }
    return n;
  });

export const customerRowSchema = z.object({
  customer_id: requiredText(10),
  customer_name: requiredText(100),
  gender: optionalText(10),
  age: optionalAge,
  city: optionalText(50),
}) satisfies z.ZodType<Customer, z.ZodTypeDef, unknown>;

export const productRowSchema = z.object({
  product_id: requiredText(10),
  product_name: requiredText(100),
  category: requiredText(50),
  unit_price: money,
}) satisfies z.ZodType<Product, z.ZodTypeDef, unknown>;

export const transactionRowSchema = z
  .object({
    order_id: requiredText(20),
    // kept verbatim; an unreadable date is repaired later, never rejected here
    order_date: z.string().optional().default(''),
    customer_id: requiredText(10),
    product_id: requiredText(10),
    store_id: requiredText(10),
    quantity,
    unit_price: money,
  })
  .transform(({ order_date, ...rest }, ctx): TransactionRecord => {
    if (rest.quantity * toCents(rest.unit_price) > MAX_LINE_TOTAL_CENTS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `total_sales must not exceed ${fromCents(MAX_LINE_TOTAL_CENTS)}`,
      });
      return z.NEVER;
    }
    return { ...rest, order_date_raw: order_date };
  });

export function validateRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: CsvRow): T {
  const result = schema.safeParse(row);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      field: i.path.join('.') || 'row',
      message: i.message,
    }));
    throw new ValidationError(issues.map((i) => `${i.field} ${i.message}`).join('; '), issues);
  }
  return result.data;
}
