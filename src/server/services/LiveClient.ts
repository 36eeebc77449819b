/**
 * LiveClient — one per WebSocket connection on /ws.
 *
 * Greets the client with hello_ack, subscribes to the session's track and
 * status listeners and forwards every update as JSON. A client `hello`
 * only checks the protocol version. Unsubscribes on destroy().
 */

import type { WebSocket } from 'ws';
import { z } from 'zod';
import {
  LIVE_PROTOCOL_VERSION,
  type ClientMessage,
  type ServerMessage,
} from '../../types/protocol.js';
import type { Unsubscribe } from '../../types/session.js';
import type { SessionManager } from './SessionManager.js';

const MAX_MSGS_PER_SEC = 20;

/** The part of a ws socket LiveClient writes to. */
export type LiveSocket = Pick<WebSocket, 'readyState' | 'send'>;

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('hello'), protocolVersion: z.number() }),
  z.object({ type: z.literal('ping'), clientTimestamp: z.number() }),
]);

/** Parse one text frame. Throws on malformed JSON or an unknown message. */
export function parseClientMessage(raw: string): ClientMessage {
  const parsed = ClientMessageSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map(i => `${i.path.join('.') || 'message'}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

export class LiveClient {
  private subscriptions: Unsubscribe[] = [];
  private msgTimestamps: number[] = [];

  constructor(
    private readonly ws: LiveSocket,
    private readonly session: SessionManager,
  ) {}

  get subscribed(): boolean {
    return this.subscriptions.length > 0;
  }

  // ── Lifecycle ────────────────────────────────────────────────

  /** Greet with hello_ack and start pushing updates. Called on connect. */
  open() {
    this.sendAck();
    if (this.subscribed) return;
    this.subscriptions.push(
      this.session.onTrackChanged((track) => this.send({ type: 'track_update', data: track })),
      this.session.onStatusChanged((status) => this.send({ type: 'status_update', data: status })),
    );
  }

  destroy() {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
  }

  // ── Message dispatch ─────────────────────────────────────────

  handleMessage(msg: ClientMessage): void {
    const now = Date.now();
    this.msgTimestamps.push(now);
    while (this.msgTimestamps.length > 0 && this.msgTimestamps[0] < now - 1000) {
      this.msgTimestamps.shift();
    }
    if (this.msgTimestamps.length > MAX_MSGS_PER_SEC) {
      this.sendError('RATE_LIMITED', `Too many messages (>${MAX_MSGS_PER_SEC}/sec). Slow down.`);
      return;
    }

    switch (msg.type) {
      case 'hello':
        if (msg.protocolVersion !== LIVE_PROTOCOL_VERSION) {
          this.sendError('PROTOCOL_MISMATCH',
            `Server speaks protocol v${LIVE_PROTOCOL_VERSION}, client sent v${msg.protocolVersion}`);
          return;
        }
        this.sendAck();
        break;

      case 'ping':
        this.send({ type: 'pong', clientTimestamp: msg.clientTimestamp, serverTimestamp: now });
        break;
    }
  }

  // ── Send helpers ─────────────────────────────────────────────

  private sendAck() {
    this.send({ type: 'hello_ack', protocolVersion: LIVE_PROTOCOL_VERSION, status: this.session.getStatus() });
  }

  private send(msg: ServerMessage) {
    if (this.ws.readyState === 1 /* WebSocket.OPEN */) {
      this.ws.send(JSON.stringify(msg));
    }
  }

  sendError(code: string, message: string) {
    this.send({ type: 'error', code, message });
  }
}
