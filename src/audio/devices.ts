import { runCommand } from '../util/runCommand.js';

export interface AudioDevice {
  /** Card number; substituted for `{id}` in the capture device template. */
  index: number;
  name: string;
  description: string;
}

const CARD_LINE = /^card (\d+): (\S+) \[([^\]]*)\], device (\d+): ([^[]*?)\s*\[([^\]]*)\]/;

/** Parse `arecord -l` output. One entry per card (its first capture device). */
export function parseArecordList(output: string): AudioDevice[] {
  const devices: AudioDevice[] = [];
  const seen = new Set<number>();

  for (const line of output.split('\n')) {
    const match = CARD_LINE.exec(line.trim());
    if (!match) continue;
    const index = Number(match[1]);
    if (seen.has(index)) continue;
    seen.add(index);
    devices.push({
      index,
      name: match[3],
      description: match[6] || match[5],
    });
  }

  return devices;
}

export async function listInputDevices(): Promise<AudioDevice[]> {
  const { stdout } = await runCommand('arecord', ['-l'], { timeoutMs: 5000 });
  return parseArecordList(stdout);
}

/** Prefer a USB interface (the usual turntable setup), else the first input. */
export function pickDefaultDevice(devices: AudioDevice[]): AudioDevice | null {
  const usb = devices.find(d => /usb/i.test(d.name) || /usb/i.test(d.description));
  return usb ?? devices[0] ?? null;
}
