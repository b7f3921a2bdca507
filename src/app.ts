// ──────────────────────────────────────────
// App entry point: bootstrap + Express server
// ──────────────────────────────────────────

import { getConfig } from './platform/config';
import { getDb, closeDb } from './db/connection';

// Ingestion
import { LoadBatchRepo } from './domains/ingestion/load-batch.repo';
import { LoadService } from './domains/ingestion/load.service';

// Modeling
import { CustomerModel } from './domains/modeling/models/customer';
import { ProductModel } from './domains/modeling/models/product';
import { TransactionModel } from './domains/modeling/models/transaction';
import { DateRepairJob } from './domains/modeling/date-repair.job';

// Analytics
import { ReportService } from './domains/analytics/report.service';

import { Pipeline } from './pipeline';
import { createApp } from './server';

async function main() {
  const config = getConfig();
  const db = getDb();

  await db.migrate.latest({
    directory: __dirname + '/db/migrations',
    extension: 'ts',
  });

  // ── Stores ──
  const customerModel = new CustomerModel(db);
  const productModel = new ProductModel(db);
  const transactionModel = new TransactionModel(db);
  const loadBatchRepo = new LoadBatchRepo(db);

  // ── Domains ──
  const loadService = new LoadService(customerModel, productModel, transactionModel, loadBatchRepo);
  const dateRepairJob = new DateRepairJob(transactionModel);
  const reportService = new ReportService(transactionModel, productModel, dateRepairJob, config.TOP_PRODUCTS_LIMIT);
  const pipeline = new Pipeline(loadService, dateRepairJob);

  const app = createApp({ pipeline, batches: loadBatchRepo, reportService });
  const server = app.listen(config.PORT, () => {
    console.log(`[App] Retail sales pipeline listening on port ${config.PORT}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('[App] Shutting down...');
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[App] Shutdown error:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
