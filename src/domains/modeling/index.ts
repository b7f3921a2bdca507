// ──────────────────────────────────────────
// Modeling domain: barrel export
// ──────────────────────────────────────────

export { DateRepairJob } from './date-repair.job';
export { normalizeDate, normalizeDates, DEFAULT_DATE_STRATEGIES } from './date-normalizer';
export { TransactionTransformer } from './transformers/transaction.transformer';
export { CustomerModel } from './models/customer';
export { ProductModel } from './models/product';
export { TransactionModel } from './models/transaction';
