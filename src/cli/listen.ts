#!/usr/bin/env node
import { resolve } from 'node:path';
import { listInputDevices, pickDefaultDevice } from '../audio/devices.js';
import { loadConfig, resolveConfigPath } from '../config/loader.js';
import { describeError } from '../errors.js';
import { createRuntime } from '../runtime.js';
import { USAGE, parseListenArgs, type ListenOptions } from './args.js';
import { renderNowPlayingBox, renderPanel } from './display.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

async function main() {
  let opts: ListenOptions;
  try {
    opts = parseListenArgs(process.argv.slice(2));
  } catch (err) {
    console.error(describeError(err));
    console.error(USAGE);
    process.exit(2);
  }
  if (opts.help) {
    console.log(USAGE);
    return;
  }

  const configPath = opts.configPath ? resolve(opts.configPath) : resolveConfigPath();
  const config = await loadConfig(configPath);
  if (opts.verbose) config.logging.verbose = true;

  if (opts.listDevices) {
    const devices = await listInputDevices();
    if (devices.length === 0) console.log('No capture devices found.');
    for (const d of devices) console.log(`${d.index}: ${d.name} - ${d.description}`);
    return;
  }

  let device = opts.device;
  if (device === null) {
    const picked = pickDefaultDevice(await listInputDevices());
    if (!picked) {
      console.error('[listen] No capture device found. Connect one or pass --device N.');
      process.exit(1);
    }
    console.log(`[listen] Using audio device: ${picked.name} (card ${picked.index})`);
    device = picked.index;
  } else {
    console.log(`[listen] Using audio device: card ${device}`);
  }

  const { session } = createRuntime(config);
  const columns = () => process.stdout.columns || 60;

  if (opts.tui) {
    session.onStatusChanged((status) => {
      process.stdout.write(CLEAR_SCREEN + renderPanel(status, columns()) + '\n');
    });
  } else {
    session.onTrackChanged((track) => {
      if (track) console.log(renderNowPlayingBox(track.artist, track.title, Math.min(columns(), 60)));
    });
  }

  let stopping = false;
  const stop = async () => {
    if (stopping) return;
    stopping = true;
    await session.stop();
    await session.flushListeners();
    process.exit(0);
  };
  session.onStatusChanged((status) => {
    if (stopping || status.running) return;
    console.error(`[listen] Session ended: ${status.debug.lastError ?? 'unknown error'}`);
    process.exit(1);
  });
  process.on('SIGINT', () => void stop());
  process.on('SIGTERM', () => void stop());

  await session.start(device);
  console.log('[listen] Listening. Press Ctrl+C to stop.');
}

main().catch((err: unknown) => {
  console.error(`[listen] ${describeError(err)}`);
  process.exit(1);
});
