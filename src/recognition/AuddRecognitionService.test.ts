import { describe, it, expect, vi } from 'vitest';
import { AuddRecognitionService } from './AuddRecognitionService.js';
import { RecognitionError } from '../errors.js';
import { pcm } from '../test/fakes.js';

function respondWith(body: unknown, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } }));
}

const clip = pcm(0.25, 480, 48000);

describe('AuddRecognitionService', () => {
  it('posts the clip as a WAV file with the api token', async () => {
    const fetchImpl = respondWith({ status: 'success', result: null });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', apiToken: 'test-token', fetchImpl });

    await service.identify(clip);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://audd.test/');
    expect(init?.method).toBe('POST');
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.get('api_token')).toBe('test-token');
      const file = form.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) {
        expect(file.size).toBe(44 + 480 * 2);
      }
    }
  });

  it('leaves out the token when none is configured', async () => {
    const fetchImpl = respondWith({ status: 'success', result: null });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    await service.identify(clip);

    const form = fetchImpl.mock.calls[0][1]?.body;
    expect(form instanceof FormData && form.has('api_token')).toBe(false);
  });

  it('maps a match, scaling the score to 0..1', async () => {
    const fetchImpl = respondWith({
      status: 'success',
      result: { artist: 'The Band', title: 'The Song', album: 'The Album', score: 85 },
    });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    expect(await service.identify(clip)).toEqual({ artist: 'The Band', title: 'The Song', confidence: 0.85 });
  });

  it('reports full confidence when no score is given', async () => {
    const fetchImpl = respondWith({ status: 'success', result: { artist: 'A', title: 'X' } });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    expect(await service.identify(clip)).toEqual({ artist: 'A', title: 'X', confidence: 1 });
  });

  it('returns null when nothing matched', async () => {
    const fetchImpl = respondWith({ status: 'success', result: null });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    expect(await service.identify(clip)).toBeNull();
  });

  it('turns an API error into a RecognitionError', async () => {
    const fetchImpl = respondWith({ status: 'error', error: { error_code: 901, error_message: 'Recognition failed' } });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    await expect(service.identify(clip)).rejects.toThrow(new RecognitionError('AudD error 901: Recognition failed'));
  });

  it('turns an HTTP failure into a RecognitionError', async () => {
    const fetchImpl = respondWith({}, 502);
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    await expect(service.identify(clip)).rejects.toThrow('AudD responded with HTTP 502');
  });

  it('rejects a response of unexpected shape', async () => {
    const fetchImpl = respondWith({ hello: 'world' });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    await expect(service.identify(clip)).rejects.toThrow('AudD returned an unexpected response');
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const service = new AuddRecognitionService({ endpoint: 'https://audd.test/', fetchImpl });

    await expect(service.identify(clip)).rejects.toThrow('AudD request failed: fetch failed');
  });
});
