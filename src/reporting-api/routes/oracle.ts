// src/reporting-api/routes/oracle.ts
// Callback endpoint for the decryption oracle. Open to anyone: the proof is
// the only credential, so no principal header is required.

import { Router } from 'express';
import { z } from 'zod';
import type { ReportingDesk } from '@core/desk';
import { asyncHandler, parseWith } from '../middleware/index';

const callbackSchema = z.object({
  requestId: z.string().min(1),
  clearValues: z.array(z.number()),
  proof: z.string(),
});

export function createOracleRouter(desk: ReportingDesk): Router {
  const router = Router();

  router.post(
    '/callback',
    asyncHandler(async (req, res) => {
      const { requestId, clearValues, proof } = parseWith(callbackSchema, req.body);
      const outcome = await desk.handleCallback(requestId, clearValues, proof);
      res.json({ success: true, data: outcome });
    }),
  );

  return router;
}
