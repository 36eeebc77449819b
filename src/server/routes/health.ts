import { Router } from 'express';
import type { SessionManager } from '../services/SessionManager.js';

const startedAt = Date.now();

export function healthRouter(session: SessionManager): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      ok: true,
      version: process.env.APP_VERSION ?? 'dev',
      node: process.version,
      running: session.isRunning,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
