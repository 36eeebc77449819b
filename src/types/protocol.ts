/**
 * WebSocket push protocol — needledrop live view
 *
 * All messages are JSON. Each has a `type` field for discrimination.
 * Protocol version is exchanged in hello/hello_ack.
 */

import type { SessionStatus, Track } from './session.js';

export const LIVE_PROTOCOL_VERSION = 1;

// ── Client → Server ──────────────────────────────────────────────

export interface HelloMessage {
  type: 'hello';
  protocolVersion: number;
}

export interface PingMessage {
  type: 'ping';
  clientTimestamp: number;
}

export type ClientMessage =
  | HelloMessage
  | PingMessage;

// ── Server → Client ──────────────────────────────────────────────

export interface HelloAckMessage {
  type: 'hello_ack';
  protocolVersion: number;
  status: SessionStatus;
}

export interface TrackUpdateMessage {
  type: 'track_update';
  data: Track | null;          // null once the record stops / session ends
}

export interface StatusUpdateMessage {
  type: 'status_update';
  data: SessionStatus;
}

export interface PongMessage {
  type: 'pong';
  clientTimestamp: number;
  serverTimestamp: number;
}

export interface ErrorMessage {
  type: 'error';
  code: string;
  message: string;
}

export type ServerMessage =
  | HelloAckMessage
  | TrackUpdateMessage
  | StatusUpdateMessage
  | PongMessage
  | ErrorMessage;
