import { Router } from 'express';
import type { ReportingDesk } from '@core/desk';
import healthRouter from './health';
import { createReportsRouter } from './reports';
import { createInvestigatorsRouter } from './investigators';
import { createAuthorityRouter } from './authority';
import { createOracleRouter } from './oracle';
import { createLedgerRouter } from './ledger';

export function createApiRouter(desk: ReportingDesk): Router {
  const router = Router();
  router.use(healthRouter);
  router.use(createLedgerRouter(desk));
  router.use('/reports', createReportsRouter(desk));
  router.use('/investigators', createInvestigatorsRouter(desk));
  router.use('/authority', createAuthorityRouter(desk));
  router.use('/oracle', createOracleRouter(desk));
  return router;
}
