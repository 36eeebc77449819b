import type { LastFmConfig } from '../config/schema.js';
import { SinkError } from '../errors.js';
import type { TrackMetadata } from '../types/session.js';
import { LastFmClient, type LastFmClientOptions } from './LastFmClient.js';
import { DisabledScrobbleSink, type ScrobbleSink, type TrackMetadataProvider } from './ScrobbleSink.js';

/**
 * The Last.fm account currently in effect. The settings endpoint can swap
 * credentials while a session runs; the session keeps talking to this
 * object and the next report goes out with the new client.
 */
export class LastFmAccount implements ScrobbleSink, TrackMetadataProvider {
  private client: LastFmClient | null = null;
  private current: LastFmConfig | null = null;
  private readonly disabled: DisabledScrobbleSink;

  constructor(
    config: LastFmConfig | undefined,
    verbose = false,
    private readonly clientOptions: LastFmClientOptions = {},
  ) {
    this.disabled = new DisabledScrobbleSink(verbose);
    this.configure(config ?? null);
  }

  get config(): LastFmConfig | null {
    return this.current;
  }

  get configured(): boolean {
    return this.client !== null;
  }

  get enabled(): boolean {
    return this.configured;
  }

  configure(config: LastFmConfig | null): void {
    this.current = config;
    this.client = config ? new LastFmClient(config, this.clientOptions) : null;
  }

  updateNowPlaying(artist: string, title: string, signal?: AbortSignal): Promise<void> {
    return (this.client ?? this.disabled).updateNowPlaying(artist, title, signal);
  }

  scrobble(artist: string, title: string, timestamp: number, signal?: AbortSignal): Promise<void> {
    return (this.client ?? this.disabled).scrobble(artist, title, timestamp, signal);
  }

  async lookup(artist: string, title: string, signal?: AbortSignal): Promise<TrackMetadata | null> {
    if (!this.client) return null;
    return this.client.lookup(artist, title, signal);
  }

  async verify(signal?: AbortSignal): Promise<string> {
    if (!this.client) throw new SinkError('Last.fm is not configured');
    return this.client.verify(signal);
  }
}
