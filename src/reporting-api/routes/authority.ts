import { Router } from 'express';
import { z } from 'zod';
import type { ReportingDesk } from '@core/desk';
import { asyncHandler, callerContext, parseWith } from '../middleware/index';

const transferSchema = z.object({ address: z.string() });

export function createAuthorityRouter(desk: ReportingDesk): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ success: true, data: { authority: desk.getAuthority() } });
  });

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const ctx = callerContext(req);
      const { address } = parseWith(transferSchema, req.body);
      await desk.transferAuthority(ctx, address);
      res.json({ success: true, data: { authority: desk.getAuthority() } });
    }),
  );

  return router;
}
