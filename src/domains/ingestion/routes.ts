// ──────────────────────────────────────────
// Ingestion: Load routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Pipeline } from '../../pipeline';
import { LoadBatchLog } from '../../shared/contracts';
import { SourceUnreadableError } from '../../shared/errors';

const loadBodySchema = z.object({
  customers: z.string(),
  products: z.string(),
  transactions: z.string(),
});

const batchIdSchema = z.string().uuid();

export function createLoadRoutes(pipeline: Pipeline, batches: LoadBatchLog): Router {
  const router = Router();

  // POST /: bulk load CSV text for all three tables, then repair dates
  router.post('/', async (req: Request, res: Response) => {
    const body = loadBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Body must contain customers, products and transactions CSV text' });
      return;
    }

    try {
      const result = await pipeline.runOnce(body.data);
      res.status(201).json(result);
    } catch (err) {
      if (err instanceof SourceUnreadableError) {
        res.status(400).json({ error: err.message });
        return;
      }
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  // GET /batches/:id: load batch record
  router.get('/batches/:id', async (req: Request, res: Response) => {
    const batchId = batchIdSchema.safeParse(req.params.id);
    if (!batchId.success) {
      res.status(404).json({ error: 'Batch not found' });
      return;
    }

    try {
      const batch = await batches.findById(batchId.data);
      if (!batch) {
        res.status(404).json({ error: 'Batch not found' });
        return;
      }
      res.json(batch);
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Internal error';
      res.status(500).json({ error: message });
    }
  });

  return router;
}
