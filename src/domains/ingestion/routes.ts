// ──────────────────────────────────────────
// Ingestion: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { IngestionService } from './ingestion.service';
import { RawSaleRecord } from '../../shared/types';
import { sendError } from '../analytics/routes';

export function createIngestionRoutes(ingestionService: IngestionService): Router {
  const router = Router();

  // POST /batch — bulk upload of raw sales rows
  router.post('/batch', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const records = isObject(body) ? body.records : undefined;

      if (!Array.isArray(records) || !records.every(isObject)) {
        res.status(400).json({ error: 'Missing records array', code: 'SCHEMA_ERROR' });
        return;
      }

      const batchKey = isObject(body) && typeof body.batch_key === 'string' ? body.batch_key : undefined;
      const report = await ingestionService.ingest(records, { batchKey });
      res.status(201).json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function isObject(value: unknown): value is RawSaleRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
