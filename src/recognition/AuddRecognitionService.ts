import { z } from 'zod';
import type { PcmBuffer } from '../audio/AudioSource.js';
import { encodeWav } from '../audio/wav.js';
import { RecognitionError, describeError, isAbortError } from '../errors.js';
import type { RecognitionResult, RecognitionService } from './RecognitionService.js';

const AuddResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    result: z.object({
      artist: z.string(),
      title: z.string(),
      score: z.number().optional(),
    }).nullable(),
  }),
  z.object({
    status: z.literal('error'),
    error: z.object({
      error_code: z.number(),
      error_message: z.string(),
    }),
  }),
]);

export interface AuddOptions {
  endpoint: string;
  /** Without a token AudD serves a small number of trial requests per day. */
  apiToken?: string;
  fetchImpl?: typeof fetch;
}

/** Identifies clips with the AudD music recognition API. */
export class AuddRecognitionService implements RecognitionService {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: AuddOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async identify(clip: PcmBuffer, signal?: AbortSignal): Promise<RecognitionResult | null> {
    const form = new FormData();
    if (this.options.apiToken) form.append('api_token', this.options.apiToken);
    form.append('file', new Blob([encodeWav(clip)], { type: 'audio/wav' }), 'clip.wav');

    let body: unknown;
    try {
      const response = await this.fetchImpl(this.options.endpoint, { method: 'POST', body: form, signal });
      if (!response.ok) {
        throw new RecognitionError(`AudD responded with HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (err) {
      if (signal?.aborted || isAbortError(err) || err instanceof RecognitionError) throw err;
      throw new RecognitionError(`AudD request failed: ${describeError(err)}`, { cause: err });
    }

    const parsed = AuddResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RecognitionError('AudD returned an unexpected response');
    }

    const data = parsed.data;
    if (data.status === 'error') {
      throw new RecognitionError(`AudD error ${data.error.error_code}: ${data.error.error_message}`);
    }
    if (!data.result) return null;

    return {
      artist: data.result.artist,
      title: data.result.title,
      confidence: data.result.score !== undefined ? data.result.score / 100 : 1,
    };
  }
}
