import { Router } from 'express';
import { LastFmConfigSchema, type LastFmConfig } from '../../config/schema.js';
import { PASSWORD_MASK, maskLastFm } from '../../config/loader.js';
import { describeError } from '../../errors.js';
import type { LastFmAccount } from '../../scrobble/LastFmAccount.js';

export interface LastFmRouterDeps {
  account: LastFmAccount;
  /** Persist new credentials (writes the config file). */
  save: (config: LastFmConfig) => Promise<void>;
}

export function lastfmRouter({ account, save }: LastFmRouterDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ ok: true, configured: account.configured, ...maskLastFm(account.config ?? undefined) });
  });

  router.post('/', async (req, res) => {
    const parsed = LastFmConfigSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ ok: false, error: 'apiKey, apiSecret, username and password are required' });
      return;
    }

    // The form echoes the mask back when the password was left untouched
    const next = { ...parsed.data };
    if (next.password === PASSWORD_MASK) {
      const existing = account.config?.password;
      if (!existing) {
        res.status(400).json({ ok: false, error: 'password is required' });
        return;
      }
      next.password = existing;
    }

    try {
      await save(next);
      account.configure(next);
      console.log(`[api] Last.fm credentials updated for ${next.username}`);
      res.json({ ok: true, ...maskLastFm(next) });
    } catch (err) {
      console.error('[api] Saving Last.fm config failed:', describeError(err));
      res.status(500).json({ ok: false, error: describeError(err) });
    }
  });

  router.get('/test', async (_req, res) => {
    if (!account.configured) {
      res.status(400).json({ ok: false, error: 'Last.fm is not configured' });
      return;
    }
    try {
      const username = await account.verify();
      res.json({ ok: true, username });
    } catch (err) {
      res.status(502).json({ ok: false, error: describeError(err) });
    }
  });

  return router;
}
