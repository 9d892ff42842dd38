import { Router, type Request, type Response } from 'express';
import { query, pool } from '../db';
import { getErrorMessage } from '../lib/errors';
import { withTimeout } from '../lib/timeouts';

const router = Router();

const DB_TIMEOUT_MS = Number(process.env.HEALTH_DB_TIMEOUT_MS || 1500);

router.get('/health/live', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

router.get('/health/ready', async (_req: Request, res: Response) => {
  const start = Date.now();
  let db: { ok: boolean; error?: string };

  try {
    await withTimeout(query('SELECT 1'), DB_TIMEOUT_MS, 'db');
    db = { ok: true };
  } catch (error) {
    db = { ok: false, error: getErrorMessage(error) };
  }

  res.status(db.ok ? 200 : 503).json({
    status: db.ok ? 'ok' : 'not_ready',
    ready: db.ok,
    timestamp: new Date().toISOString(),
    details: {
      db,
      durationMs: Date.now() - start,
      pool: {
        total: pool.totalCount,
        idle: pool.idleCount,
        waiting: pool.waitingCount
      }
    }
  });
});

export default router;
