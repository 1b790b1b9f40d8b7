import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ReportingDesk } from '@core/desk';
import { API_PREFIX } from '@shared/constants';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export interface AppOptions {
  clientUrl?: string;
  logRequests?: boolean;
}

export function createApp(desk: ReportingDesk, options: AppOptions = {}) {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.clientUrl ?? false, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, createApiRouter(desk));
  app.use(errorHandler);

  return app;
}
