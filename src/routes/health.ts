import { Router } from 'express';
import pino from 'pino';
import type { Queryable } from '../services/checkpoint/pg-checkpoint-store.js';

const log = pino({ name: 'health' });

/** Liveness plus a database round trip when checkpoints are durable. */
export function createHealthRouter(db: Queryable | null): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    if (!db) {
      res.json({ status: 'ok', database: 'disabled', timestamp: new Date().toISOString() });
      return;
    }

    try {
      await db.query('SELECT 1');
      res.json({ status: 'ok', database: 'ok', timestamp: new Date().toISOString() });
    } catch (err) {
      log.warn({ err }, 'Health check database query failed');
      res.status(503).json({ status: 'error', database: 'unreachable' });
    }
  });

  return router;
}
