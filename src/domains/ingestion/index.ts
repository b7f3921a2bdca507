// ──────────────────────────────────────────
// Ingestion domain: barrel export
// ──────────────────────────────────────────

export { LoadService } from './load.service';
export { LoadBatchRepo } from './load-batch.repo';
export { parseCsv, readLoadSource } from './csv-reader';
