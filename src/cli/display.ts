/**
 * Terminal rendering for `listen`. Pure functions returning strings; the
 * caller decides when to clear the screen and write.
 */

import type { SessionStatus } from '../types/session.js';

const MIN_COLUMNS = 24;

function rule(width: number): string {
  return '+' + '-'.repeat(width - 2) + '+';
}

/** `| text      |`, truncated with an ellipsis when it does not fit. */
function row(text: string, width: number): string {
  const inner = width - 4;
  const clipped = text.length > inner ? text.slice(0, inner - 1) + '…' : text;
  return '| ' + clipped.padEnd(inner) + ' |';
}

function centred(text: string, width: number): string {
  const inner = width - 4;
  const clipped = text.length > inner ? text.slice(0, inner - 1) + '…' : text;
  const left = Math.floor((inner - clipped.length) / 2);
  return '| ' + ' '.repeat(left) + clipped.padEnd(inner - left) + ' |';
}

/** Boxed title/artist with both lines centred. */
export function renderNowPlayingBox(artist: string, title: string, columns: number): string {
  const width = Math.max(MIN_COLUMNS, columns);
  return [
    rule(width),
    centred(title, width),
    centred(`by ${artist}`, width),
    rule(width),
  ].join('\n');
}

/** Full TUI frame: header, current track, then listening state and level. */
export function renderPanel(status: SessionStatus, columns: number): string {
  const width = Math.max(MIN_COLUMNS, columns);
  const lines = [rule(width), centred('needledrop', width), rule(width)];

  const track = status.currentTrack;
  if (track) {
    lines.push(row('Now Playing:', width));
    lines.push(row(`  Title: ${track.title}`, width));
    lines.push(row(`  Artist: ${track.artist}`, width));
    if (track.metadata?.album) {
      const year = track.metadata.album.year ? ` (${track.metadata.album.year})` : '';
      lines.push(row(`  Album: ${track.metadata.album.name}${year}`, width));
    }
  } else {
    lines.push(row('', width));
    lines.push(row('No track currently playing', width));
    lines.push(row('', width));
  }

  lines.push(rule(width));
  const { activity, audioLevel, lastError } = status.debug;
  if (!status.running) {
    lines.push(row('Stopped', width));
  } else if (activity === 'standby') {
    lines.push(row(`Standby - waiting for audio (level ${audioLevel.toFixed(3)})`, width));
  } else {
    lines.push(row(`Active - listening for tracks (level ${audioLevel.toFixed(3)})`, width));
  }
  if (lastError) lines.push(row(`Last error: ${lastError}`, width));
  lines.push(rule(width));

  return lines.join('\n');
}
