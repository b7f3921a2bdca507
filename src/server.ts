// ──────────────────────────────────────────
// Express app: routes over already-wired services
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { Pipeline } from './pipeline';
import { LoadBatchLog } from './shared/contracts';
import { ReportService } from './domains/analytics/report.service';
import { createReportRoutes } from './domains/analytics/routes';
import { createLoadRoutes } from './domains/ingestion/routes';

export interface AppServices {
  pipeline: Pipeline;
  batches: LoadBatchLog;
  reportService: ReportService;
}

export function createApp({ pipeline, batches, reportService }: AppServices): Express {
  const app = express();
  app.use(express.json({ limit: '25mb' }));

  app.use('/api/v1/load', createLoadRoutes(pipeline, batches));
  app.use('/api/v1/reports', createReportRoutes(reportService));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
