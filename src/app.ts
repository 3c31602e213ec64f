import express from 'express';
import helmet from 'helmet';
import pino from 'pino';
import { createHealthRouter } from './routes/health.js';
import { createStatusRouter, type StatusSources } from './routes/status.js';
import type { Queryable } from './services/checkpoint/pg-checkpoint-store.js';

const logger = pino({ name: 'http' });

export interface AppDeps extends StatusSources {
  db: Queryable | null;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(createHealthRouter(deps.db));
  app.use('/api/status', createStatusRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
