// ──────────────────────────────────────────
// Analytics: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { AnalyticsFacade } from './analytics.facade';
import { parseInterval } from './scope';
import { AggregationError, statusForError } from '../../shared/errors';

export function createAnalyticsRoutes(analytics: AnalyticsFacade): Router {
  const router = Router();

  // GET /time-series?start=2023-01-01&end=2023-03-31&interval=week
  router.get('/time-series', async (req: Request, res: Response) => {
    try {
      const interval = parseInterval(queryParam(req, 'interval'));
      const data = await analytics.timeSeries(queryParam(req, 'start'), queryParam(req, 'end'), interval);
      res.json(data);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /products?start=...&end=...
  router.get('/products', async (req: Request, res: Response) => {
    try {
      const data = await analytics.productAnalysis(queryParam(req, 'start'), queryParam(req, 'end'));
      res.json(data);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /customers?start=...&end=...
  router.get('/customers', async (req: Request, res: Response) => {
    try {
      const data = await analytics.customerAnalysis(queryParam(req, 'start'), queryParam(req, 'end'));
      res.json(data);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /overview?start=...&end=... — headline totals for dashboard cards
  router.get('/overview', async (req: Request, res: Response) => {
    try {
      const data = await analytics.salesOverview(queryParam(req, 'start'), queryParam(req, 'end'));
      res.json(data);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

export function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (value === undefined || typeof value === 'string') return value;
  throw new AggregationError(`Query parameter ${name} must be given once as a plain value`);
}

export function sendError(res: Response, err: unknown): void {
  const { status, code, message } = statusForError(err);
  if (status >= 500) console.error(`[API] ${code}:`, message);
  res.status(status).json({ error: message, code });
}
