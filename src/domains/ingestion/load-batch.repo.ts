// ──────────────────────────────────────────
// Ingestion: Load batch repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { LoadBatchLog } from '../../shared/contracts';
import { LoadBatch, LoadReport } from '../../shared/types';

export class LoadBatchRepo implements LoadBatchLog {
  constructor(private db: Knex) {}

  async start(batchId: string): Promise<void> {
    await this.db('load_batches').insert({ id: batchId, status: 'processing' });
  }

  async complete(report: LoadReport): Promise<void> {
    await this.db('load_batches').where('id', report.batch_id).update({
      status: report.status,
      customers_total: report.customers.total,
      customers_accepted: report.customers.accepted,
      products_total: report.products.total,
      products_accepted: report.products.accepted,
      transactions_total: report.transactions.total,
      transactions_accepted: report.transactions.accepted,
      rejected: report.rejections.length,
      completed_at: new Date(),
    });
  }

  async fail(batchId: string, error: string): Promise<void> {
    await this.db('load_batches')
      .where('id', batchId)
      .update({ status: 'failed', error, completed_at: new Date() });
  }

  async findById(batchId: string): Promise<LoadBatch | null> {
    const row = await this.db('load_batches').where('id', batchId).first();
    return row ?? null;
  }
}
