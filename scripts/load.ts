// ──────────────────────────────────────────
// Script: Load: migrate, load a CSV directory, repair dates,
// and print every report view
// ──────────────────────────────────────────

import path from 'path';
import { getConfig } from '../src/platform/config';
import { getDb, closeDb } from '../src/db/connection';
import { readLoadSource } from '../src/domains/ingestion/csv-reader';
import { LoadService } from '../src/domains/ingestion/load.service';
import { LoadBatchRepo } from '../src/domains/ingestion/load-batch.repo';
import { CustomerModel } from '../src/domains/modeling/models/customer';
import { ProductModel } from '../src/domains/modeling/models/product';
import { TransactionModel } from '../src/domains/modeling/models/transaction';
import { DateRepairJob } from '../src/domains/modeling/date-repair.job';
import { ReportService } from '../src/domains/analytics/report.service';
import { Pipeline } from '../src/pipeline';

async function load() {
  const config = getConfig();
  const dir = path.resolve(process.argv[2] ?? config.DATA_DIR);
  const db = getDb();

  console.log('[Load] Running migrations...');
  await db.migrate.latest({
    directory: __dirname + '/../src/db/migrations',
    extension: 'ts',
  });

  const customerModel = new CustomerModel(db);
  const productModel = new ProductModel(db);
  const transactionModel = new TransactionModel(db);
  const dateRepairJob = new DateRepairJob(transactionModel);
  const pipeline = new Pipeline(
    new LoadService(customerModel, productModel, transactionModel, new LoadBatchRepo(db)),
    dateRepairJob
  );
  const reportService = new ReportService(transactionModel, productModel, dateRepairJob, config.TOP_PRODUCTS_LIMIT);

  console.log(`[Load] Reading ${dir}`);
  const { load: loadReport, dates } = await pipeline.runOnce(readLoadSource(dir));

  for (const r of loadReport.rejections) {
    console.log(`[Load] rejected ${r.entity} #${r.row} ${r.key ?? '-'}: ${r.reason}`);
  }
  console.table([dates.summary]);

  const report = await reportService.getReport();
  console.log('\nMonthly revenue');
  console.table(report.monthly_revenue);
  console.log('\nCategory revenue by year');
  console.table(report.category_revenue);
  console.log('\nCustomer segments');
  console.table(report.customer_segments);
  console.log('\nTop products per store');
  console.table(report.top_products);
  console.log('\nCustomer lifetime value');
  console.table(report.customer_lifetime_value);

  await closeDb();
}

load().catch(async (err) => {
  console.error('[Load] Error:', err);
  await closeDb();
  process.exit(1);
});
