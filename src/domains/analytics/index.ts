// ──────────────────────────────────────────
// Analytics domain: barrel export
// ──────────────────────────────────────────

export { ReportService } from './report.service';
export type { SalesReport } from './report.service';
export * from './aggregations';
