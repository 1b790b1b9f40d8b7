import { Router } from 'express';
import { z } from 'zod';
import type { ReportingDesk } from '@core/desk';
import { parseWith } from '../middleware/index';

const eventsQuerySchema = z.object({
  since: z.coerce.number().int().nonnegative().default(0),
  reportId: z.coerce.number().int().positive().optional(),
});

export function createLedgerRouter(desk: ReportingDesk): Router {
  const router = Router();

  router.get('/stats', (_req, res) => {
    res.json({ success: true, data: desk.getStats() });
  });

  // Log entries, oldest first; `since` skips entries up to that sequence number
  router.get('/events', (req, res) => {
    const { since, reportId } = parseWith(eventsQuerySchema, req.query);
    const rows = desk
      .events()
      .filter((e) => e.sequence > since && (reportId === undefined || e.reportId === reportId));
    res.json({ success: true, data: rows });
  });

  return router;
}
