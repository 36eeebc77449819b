import { describe, it, expect } from 'vitest';
import { renderNowPlayingBox, renderPanel } from './display.js';
import type { SessionStatus } from '../types/session.js';

function status(overrides: Partial<SessionStatus> = {}): SessionStatus {
  return {
    running: true,
    currentDevice: 0,
    currentTrack: null,
    debug: {
      audioLevel: 0.012,
      activity: 'standby',
      lastDetectionAt: null,
      detectionCount: 0,
      noMatchStreak: 0,
      lastError: null,
    },
    ...overrides,
  };
}

describe('renderNowPlayingBox()', () => {
  it('centres title and artist inside a box of the given width', () => {
    expect(renderNowPlayingBox('Band', 'Song', 24).split('\n')).toEqual([
      '+----------------------+',
      '|         Song         |',
      '|       by Band        |',
      '+----------------------+',
    ]);
  });

  it('truncates text that does not fit', () => {
    const lines = renderNowPlayingBox('A', 'A very long song title indeed', 24).split('\n');
    expect(lines[1]).toBe('| A very long song ti… |');
    expect(lines.every(l => l.length === 24)).toBe(true);
  });
});

describe('renderPanel()', () => {
  it('shows standby with the level when nothing is playing', () => {
    const lines = renderPanel(status(), 50).split('\n');
    expect(lines).toContain('| No track currently playing                     |');
    expect(lines).toContain('| Standby - waiting for audio (level 0.012)      |');
  });

  it('shows the current track and album', () => {
    const lines = renderPanel(status({
      currentTrack: {
        artist: 'Band',
        title: 'Song',
        confidence: 1,
        detectedAt: '2026-03-01T12:00:00.000Z',
        metadata: { album: { name: 'Album', year: '1977' }, durationSec: null, tags: [], listeners: null, playcount: null },
      },
      debug: { ...status().debug, activity: 'active', audioLevel: 0.5 },
    }), 50).split('\n');

    expect(lines).toContain('|   Title: Song                                  |');
    expect(lines).toContain('|   Album: Album (1977)                          |');
    expect(lines).toContain('| Active - listening for tracks (level 0.500)    |');
  });

  it('says stopped when the session is not running', () => {
    expect(renderPanel(status({ running: false }), 30).split('\n')).toContain('| Stopped                    |');
  });
});
