import type { TrackMetadata } from '../types/session.js';

/** Destination for now-playing updates and scrobbles. Rejects with SinkError. */
export interface ScrobbleSink {
  /** False while there is no account to report to; reports are then skipped. */
  readonly enabled: boolean;
  updateNowPlaying(artist: string, title: string, signal?: AbortSignal): Promise<void>;
  /** `timestamp` is unix seconds at which the track started playing. */
  scrobble(artist: string, title: string, timestamp: number, signal?: AbortSignal): Promise<void>;
}

export interface TrackMetadataProvider {
  lookup(artist: string, title: string, signal?: AbortSignal): Promise<TrackMetadata | null>;
}

/** Used when no Last.fm account is configured: reports are only logged. */
export class DisabledScrobbleSink implements ScrobbleSink {
  readonly enabled = false;

  constructor(private readonly verbose = false) {}

  async updateNowPlaying(artist: string, title: string): Promise<void> {
    if (this.verbose) {
      console.log(`[scrobble] Last.fm not configured, skipping now-playing for ${title} by ${artist}`);
    }
  }

  async scrobble(artist: string, title: string): Promise<void> {
    if (this.verbose) {
      console.log(`[scrobble] Last.fm not configured, skipping scrobble for ${title} by ${artist}`);
    }
  }
}
