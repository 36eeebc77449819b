import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import { describeError } from '../../errors.js';
import type { SessionManager } from '../services/SessionManager.js';

const StartBody = z.object({
  deviceIndex: z.number().int().min(0),
});

/** `/status`, `/start`, `/stop`. `control` guards the two mutating routes. */
export function sessionRouter(session: SessionManager, control: RequestHandler): Router {
  const router = Router();

  router.get('/status', (_req, res) => {
    res.json({ ok: true, ...session.getStatus() });
  });

  router.post('/start', control, async (req, res) => {
    const parsed = StartBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: 'Body must be { "deviceIndex": <non-negative integer> }' });
      return;
    }

    try {
      const started = await session.start(parsed.data.deviceIndex);
      res.json({ ok: true, status: started ? 'started' : 'already_running' });
    } catch (err) {
      console.error('[api] Start failed:', describeError(err));
      res.status(500).json({ ok: false, error: describeError(err) });
    }
  });

  router.post('/stop', control, async (_req, res) => {
    try {
      const stopped = await session.stop();
      res.json({ ok: true, status: stopped ? 'stopped' : 'not_running' });
    } catch (err) {
      console.error('[api] Stop failed:', describeError(err));
      res.status(500).json({ ok: false, error: describeError(err) });
    }
  });

  return router;
}
