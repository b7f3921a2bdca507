// ──────────────────────────────────────────
// Pipeline: load → date repair, run once per batch
// ──────────────────────────────────────────

import { LoadService } from './domains/ingestion/load.service';
import { DateRepairJob } from './domains/modeling/date-repair.job';
import { DateRepairResult, LoadReport, LoadSource } from './shared/types';

export interface PipelineResult {
  load: LoadReport;
  dates: DateRepairResult;
}

export class Pipeline {
  constructor(
    private loadService: LoadService,
    private dateRepairJob: DateRepairJob
  ) {}

  async runOnce(source: LoadSource): Promise<PipelineResult> {
    console.log('[Pipeline] Loading batch...');
    const load = await this.loadService.load(source);
    const dates = await this.dateRepairJob.run();
    console.log(`[Pipeline] Completed batch ${load.batch_id} (${load.status})`);
    return { load, dates };
  }
}
