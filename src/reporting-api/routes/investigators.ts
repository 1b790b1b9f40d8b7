import { Router } from 'express';
import { z } from 'zod';
import type { ReportingDesk } from '@core/desk';
import { asyncHandler, callerContext, parseWith } from '../middleware/index';

const addressSchema = z.object({ address: z.string() });

export function createInvestigatorsRouter(desk: ReportingDesk): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const { address } = parseWith(addressSchema, req.body);
      await desk.addInvestigator(ctx, address);
      res.status(201).json({ success: true, data: { address, authorized: true } });
    }),
  );

  router.delete(
    '/:address',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      await desk.removeInvestigator(ctx, req.params.address);
      res.json({ success: true, data: { address: req.params.address, authorized: false } });
    }),
  );

  router.get('/:address', (req, res) => {
    const address = req.params.address;
    res.json({ success: true, data: { address, authorized: desk.isAuthorizedInvestigator(address) } });
  });

  router.get('/:address/reports', (req, res) => {
    const reports = desk.getInvestigatorReports(callerContext(req), req.params.address);
    res.json({ success: true, data: reports });
  });

  return router;
}
