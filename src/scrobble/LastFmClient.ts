/**
 * LastFmClient — Last.fm 2.0 API client.
 *
 * Write calls are signed POSTs: `api_sig` is the md5 of every parameter
 * (sorted by name, `format` excluded) concatenated as name+value, followed
 * by the shared secret. The session key comes from auth.getMobileSession
 * and is cached for the life of the client.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { SinkError, describeError, isAbortError } from '../errors.js';
import type { LastFmConfig } from '../config/schema.js';
import type { TrackMetadata } from '../types/session.js';
import type { ScrobbleSink, TrackMetadataProvider } from './ScrobbleSink.js';

export const LASTFM_API_ROOT = 'https://ws.audioscrobbler.com/2.0/';

/** Error 9: "Invalid session key - Please re-authenticate". */
const INVALID_SESSION_KEY = 9;
const YEAR_PATTERN = /\b(19|20)\d{2}\b/;
const MAX_TAGS = 3;

type Params = Record<string, string>;

const ApiErrorSchema = z.object({ error: z.number(), message: z.string() });

const SessionSchema = z.object({
  session: z.object({ name: z.string(), key: z.string() }),
});

const Count = z.union([z.string(), z.number()]).optional();
const TagSchema = z.object({ name: z.string() });

const TrackInfoSchema = z.object({
  track: z.object({
    duration: Count,
    listeners: Count,
    playcount: Count,
    album: z.object({ title: z.string() }).optional(),
    toptags: z.object({
      tag: z.union([z.array(TagSchema), TagSchema]).optional(),
    }).optional(),
    wiki: z.object({ content: z.string().optional() }).optional(),
  }),
});

export interface LastFmClientOptions {
  apiRoot?: string;
  fetchImpl?: typeof fetch;
}

export function signParams(params: Params, secret: string): string {
  const base = Object.keys(params)
    .filter(key => key !== 'format' && key !== 'callback')
    .sort()
    .map(key => `${key}${params[key]}`)
    .join('');
  return createHash('md5').update(base + secret, 'utf8').digest('hex');
}

function toCount(value: string | number | undefined): number | null {
  if (value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export class LastFmClient implements ScrobbleSink, TrackMetadataProvider {
  private readonly apiRoot: string;
  private readonly fetchImpl: typeof fetch;
  private sessionKey: string | null = null;
  readonly enabled = true;

  constructor(private readonly config: LastFmConfig, options: LastFmClientOptions = {}) {
    this.apiRoot = options.apiRoot ?? LASTFM_API_ROOT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  // ── ScrobbleSink ─────────────────────────────────────────────

  async updateNowPlaying(artist: string, title: string, signal?: AbortSignal): Promise<void> {
    await this.authedCall('track.updateNowPlaying', { artist, track: title }, signal);
  }

  async scrobble(artist: string, title: string, timestamp: number, signal?: AbortSignal): Promise<void> {
    await this.authedCall('track.scrobble', { artist, track: title, timestamp: String(timestamp) }, signal);
  }

  // ── TrackMetadataProvider ────────────────────────────────────

  async lookup(artist: string, title: string, signal?: AbortSignal): Promise<TrackMetadata | null> {
    const body = await this.request('GET', {
      method: 'track.getInfo',
      api_key: this.config.apiKey,
      artist,
      track: title,
      autocorrect: '1',
      format: 'json',
    }, signal);

    const parsed = TrackInfoSchema.safeParse(body);
    if (!parsed.success) return null;
    const info = parsed.data.track;

    const rawTags = info.toptags?.tag ?? [];
    const tags = (Array.isArray(rawTags) ? rawTags : [rawTags]).slice(0, MAX_TAGS).map(t => t.name);
    const durationMs = toCount(info.duration);
    const year = info.wiki?.content ? YEAR_PATTERN.exec(info.wiki.content)?.[0] ?? null : null;

    return {
      album: info.album ? { name: info.album.title, year } : null,
      durationSec: durationMs ? Math.floor(durationMs / 1000) : null,
      tags,
      listeners: toCount(info.listeners),
      playcount: toCount(info.playcount),
    };
  }

  /** Authenticate from scratch; resolves with the account name Last.fm reports. */
  async verify(signal?: AbortSignal): Promise<string> {
    this.sessionKey = null;
    const session = await this.authenticate(signal);
    return session.name;
  }

  // ── Internal helpers ─────────────────────────────────────────

  private async authedCall(method: string, params: Params, signal?: AbortSignal): Promise<unknown> {
    const sk = await this.getSessionKey(signal);
    try {
      return await this.signedPost({ ...params, method, sk }, signal);
    } catch (err) {
      if (!(err instanceof SinkError) || err.apiCode !== INVALID_SESSION_KEY) throw err;
      this.sessionKey = null;
      const fresh = await this.getSessionKey(signal);
      return this.signedPost({ ...params, method, sk: fresh }, signal);
    }
  }

  private async getSessionKey(signal?: AbortSignal): Promise<string> {
    if (this.sessionKey) return this.sessionKey;
    const session = await this.authenticate(signal);
    return session.key;
  }

  private async authenticate(signal?: AbortSignal): Promise<{ name: string; key: string }> {
    const body = await this.signedPost({
      method: 'auth.getMobileSession',
      username: this.config.username,
      password: this.config.password,
    }, signal);
    const parsed = SessionSchema.safeParse(body);
    if (!parsed.success) {
      throw new SinkError('Last.fm returned no session for auth.getMobileSession');
    }
    this.sessionKey = parsed.data.session.key;
    return parsed.data.session;
  }

  private signedPost(params: Params, signal?: AbortSignal): Promise<unknown> {
    const withKey: Params = { ...params, api_key: this.config.apiKey };
    const signed: Params = { ...withKey, api_sig: signParams(withKey, this.config.apiSecret), format: 'json' };
    return this.request('POST', signed, signal);
  }

  private async request(verb: 'GET' | 'POST', params: Params, signal?: AbortSignal): Promise<unknown> {
    const query = new URLSearchParams(params);
    let body: unknown;
    try {
      const response = verb === 'GET'
        ? await this.fetchImpl(`${this.apiRoot}?${query.toString()}`, { signal })
        : await this.fetchImpl(this.apiRoot, {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: query.toString(),
          signal,
        });
      body = await response.json();
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) throw err;
      throw new SinkError(`Last.fm ${params.method} failed: ${describeError(err)}`, null, { cause: err });
    }

    const apiError = ApiErrorSchema.safeParse(body);
    if (apiError.success) {
      throw new SinkError(`Last.fm ${params.method} error ${apiError.data.error}: ${apiError.data.message}`, apiError.data.error);
    }
    return body;
  }
}
