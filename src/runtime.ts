/**
 * Wires an AppConfig into the services a listening session needs. Shared
 * by the HTTP server and the terminal CLI.
 */

import { FfmpegAudioSource } from './audio/FfmpegAudioSource.js';
import type { AppConfig } from './config/schema.js';
import { AuddRecognitionService } from './recognition/AuddRecognitionService.js';
import { LastFmAccount } from './scrobble/LastFmAccount.js';
import { SessionManager, sessionConfigFrom } from './server/services/SessionManager.js';

export interface Runtime {
  session: SessionManager;
  lastfm: LastFmAccount;
}

export function createRuntime(config: AppConfig): Runtime {
  const verbose = config.logging.verbose;
  const lastfm = new LastFmAccount(config.lastfm, verbose);

  if (!config.recognition.apiToken) {
    console.warn('[boot] No AudD API token configured; recognition runs on the trial quota');
  }
  if (!lastfm.configured) {
    console.warn('[boot] Last.fm is not configured; detections will not be scrobbled');
  }

  const session = new SessionManager({
    audio: new FfmpegAudioSource(config.audio),
    recognizer: new AuddRecognitionService({
      endpoint: config.recognition.endpoint,
      apiToken: config.recognition.apiToken,
    }),
    sink: lastfm,
    metadata: lastfm,
    config: sessionConfigFrom(config),
  });

  return { session, lastfm };
}
