import { Router } from 'express';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/health', (_req, res) => {
  const response: ApiResponse = {
    success: true,
    data: { status: 'ok', timestamp: new Date().toISOString() },
  };
  res.json(response);
});

export default router;
