import express from 'express';
import cors from 'cors';
import type { AudioDevice } from '../audio/devices.js';
import type { LastFmConfig } from '../config/schema.js';
import type { LastFmAccount } from '../scrobble/LastFmAccount.js';
import { healthRouter } from './routes/health.js';
import { devicesRouter } from './routes/devices.js';
import { sessionRouter } from './routes/session.js';
import { lastfmRouter } from './routes/lastfm.js';
import { requireAuth } from './middleware/auth.js';
import { rateLimit } from './middleware/rateLimit.js';
import type { SessionManager } from './services/SessionManager.js';

export interface AppDeps {
  session: SessionManager;
  lastfm: LastFmAccount;
  listDevices: () => Promise<AudioDevice[]>;
  saveLastFm: (config: LastFmConfig) => Promise<void>;
  authToken?: string;
  rateLimitPerMinute: number;
}

export function createApp(deps: AppDeps) {
  const app = express();
  const auth = requireAuth(deps.authToken);

  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  // API Routes (auth-gated when an auth token is configured)
  app.use('/api/health', healthRouter(deps.session));   // public
  app.use('/api/devices', auth, devicesRouter(deps.listDevices));
  app.use('/api', auth, sessionRouter(deps.session, rateLimit(deps.rateLimitPerMinute)));
  app.use('/api/lastfm-config', auth, lastfmRouter({ account: deps.lastfm, save: deps.saveLastFm }));

  return app;
}
