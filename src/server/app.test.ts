import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp, type AppDeps } from './app.js';
import { SessionManager, sessionConfigFrom } from './services/SessionManager.js';
import { parseConfig, PASSWORD_MASK } from '../config/loader.js';
import type { LastFmConfig } from '../config/schema.js';
import { LastFmAccount } from '../scrobble/LastFmAccount.js';
import { RecordingSink, ScriptedAudioSource, ScriptedRecognizer } from '../test/fakes.js';

const credentials: LastFmConfig = {
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  username: 'listener',
  password: 'test-password',
};

describe('HTTP API', () => {
  let server: Server;
  let base: string;
  let session: SessionManager;
  let lastfm: LastFmAccount;
  let saved: LastFmConfig[];

  async function boot(overrides: Partial<AppDeps> = {}) {
    session = new SessionManager({
      audio: new ScriptedAudioSource([0]),
      recognizer: new ScriptedRecognizer([]),
      sink: new RecordingSink(),
      config: sessionConfigFrom(parseConfig({ detection: { standbyPollSeconds: 0 } })),
    });
    lastfm = new LastFmAccount(undefined, false, {
      fetchImpl: async () => new Response(JSON.stringify({ session: { name: 'listener', key: 'test-session-key' } })),
    });
    saved = [];
    const app = createApp({
      session,
      lastfm,
      listDevices: async () => [
        { index: 0, name: 'HDA Intel PCH', description: 'ALC3246 Analog' },
        { index: 1, name: 'USB Audio CODEC', description: 'USB Audio' },
      ],
      saveLastFm: async (config) => { saved.push(config); },
      rateLimitPerMinute: 30,
      ...overrides,
    });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    base = `http://127.0.0.1:${address.port}/api`;
  }

  const post = (path: string, body?: unknown, headers: Record<string, string> = {}) =>
    fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    await session.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('GET /health answers without auth', async () => {
    await boot({ authToken: 'test-token' });
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, running: false });
  });

  it('GET /devices lists inputs and the default pick', async () => {
    await boot();
    const body = await (await fetch(`${base}/devices`)).json();
    expect(body).toEqual({
      ok: true,
      devices: [
        { index: 0, name: 'HDA Intel PCH', description: 'ALC3246 Analog' },
        { index: 1, name: 'USB Audio CODEC', description: 'USB Audio' },
      ],
      defaultDevice: 1,
    });
  });

  it('POST /start then /stop walk the session through its states', async () => {
    await boot();

    expect(await (await post('/start', { deviceIndex: 1 })).json()).toEqual({ ok: true, status: 'started' });
    expect(await (await post('/start', { deviceIndex: 1 })).json()).toEqual({ ok: true, status: 'already_running' });

    const status = await (await fetch(`${base}/status`)).json();
    expect(status).toMatchObject({ ok: true, running: true, currentDevice: 1, currentTrack: null });

    expect(await (await post('/stop')).json()).toEqual({ ok: true, status: 'stopped' });
    expect(await (await post('/stop')).json()).toEqual({ ok: true, status: 'not_running' });
  });

  it('POST /start validates the body', async () => {
    await boot();
    const res = await post('/start', { deviceIndex: 'usb' });
    expect(res.status).toBe(400);
  });

  it('requires the bearer token when one is configured', async () => {
    await boot({ authToken: 'test-token' });

    expect((await fetch(`${base}/status`)).status).toBe(401);
    expect((await fetch(`${base}/status`, { headers: { Authorization: 'Bearer test-token' } })).status).toBe(200);
    expect((await fetch(`${base}/status?token=test-token`)).status).toBe(200);
  });

  it('rate-limits the control routes', async () => {
    await boot({ rateLimitPerMinute: 2 });

    expect((await post('/stop')).status).toBe(200);
    expect((await post('/stop')).status).toBe(200);
    expect((await post('/stop')).status).toBe(429);
    expect((await fetch(`${base}/status`)).status).toBe(200);
  });

  describe('/lastfm-config', () => {
    it('saves credentials and masks the password on the way out', async () => {
      await boot();

      const res = await post('/lastfm-config', credentials);
      expect(await res.json()).toEqual({ ok: true, ...credentials, password: PASSWORD_MASK });
      expect(saved).toEqual([credentials]);

      const read = await (await fetch(`${base}/lastfm-config`)).json();
      expect(read).toEqual({ ok: true, configured: true, ...credentials, password: PASSWORD_MASK });
    });

    it('keeps the stored password when the mask is posted back', async () => {
      await boot();
      await post('/lastfm-config', credentials);

      await post('/lastfm-config', { ...credentials, username: 'other', password: PASSWORD_MASK });

      expect(saved[1]).toEqual({ ...credentials, username: 'other' });
      expect(lastfm.config?.password).toBe('test-password');
    });

    it('rejects incomplete credentials', async () => {
      await boot();
      const res = await post('/lastfm-config', { apiKey: 'test-key' });
      expect(res.status).toBe(400);
      expect(saved).toEqual([]);
    });

    it('GET /test verifies the configured account', async () => {
      await boot();
      expect((await fetch(`${base}/lastfm-config/test`)).status).toBe(400);

      await post('/lastfm-config', credentials);
      expect(await (await fetch(`${base}/lastfm-config/test`)).json()).toEqual({ ok: true, username: 'listener' });
    });
  });
});
