import { createServer } from 'node:http';
import { WebSocketServer, type WebSocket as WsWebSocket } from 'ws';
import { listInputDevices } from '../audio/devices.js';
import { loadConfig, resolveConfigPath, saveConfig } from '../config/loader.js';
import { describeError } from '../errors.js';
import { createRuntime } from '../runtime.js';
import { createApp } from './app.js';
import { requireWsAuth } from './middleware/auth.js';
import { LiveClient, parseClientMessage } from './services/LiveClient.js';

const configPath = resolveConfigPath();
const config = await loadConfig(configPath).catch((err: unknown) => {
  console.error(`[boot] ${describeError(err)}`);
  process.exit(1);
});

const { session, lastfm } = createRuntime(config);

const app = createApp({
  session,
  lastfm,
  listDevices: listInputDevices,
  saveLastFm: async (next) => {
    config.lastfm = next;
    await saveConfig(configPath, config);
  },
  authToken: config.server.authToken,
  rateLimitPerMinute: config.server.rateLimitPerMinute,
});
const server = createServer(app);

console.log(`[boot] CONFIG   = ${configPath}`);
console.log(`[boot] CAPTURE  = ${config.audio.ffmpegPath} -f ${config.audio.inputFormat} ${config.audio.deviceTemplate}`);
if (!config.server.authToken) {
  console.warn('[boot] No auth token configured; the control API is open to anyone who can reach it');
}

// ── WebSocket: live updates ─────────────────────────────────────
const wss = new WebSocketServer({ server, path: '/ws' });
const clients = new Map<WsWebSocket, LiveClient>();

wss.on('connection', (ws, req) => {
  const url = new URL(req.url || '/', `http://${req.headers.host}`);
  const token = url.searchParams.get('token') ?? undefined;
  if (!requireWsAuth(config.server.authToken, token)) {
    ws.close(4001, 'Unauthorized');
    return;
  }

  const client = new LiveClient(ws, session);
  clients.set(ws, client);
  client.open();
  console.log(`[ws] Client connected (${clients.size} connected)`);

  ws.on('message', (raw) => {
    try {
      client.handleMessage(parseClientMessage(raw.toString()));
    } catch (err) {
      client.sendError('PARSE_ERROR', `Invalid message: ${describeError(err)}`);
    }
  });

  ws.on('close', () => {
    client.destroy();
    clients.delete(ws);
    console.log(`[ws] Client disconnected (${clients.size} connected)`);
  });

  ws.on('error', (err) => {
    console.error('[ws] WebSocket error:', err.message);
    client.destroy();
    clients.delete(ws);
  });
});

// ── Shutdown ────────────────────────────────────────────────────
let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[boot] ${signal} received, shutting down`);
  try {
    await session.stop();
  } catch (err) {
    console.error('[boot] Session did not stop cleanly:', describeError(err));
  }
  for (const ws of clients.keys()) ws.close(1001, 'Server shutting down');
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

const port = config.server.port;
server.listen(port, () => {
  console.log(`[boot] needledrop listening on http://localhost:${port} (ws: /ws)`);
});
