import type { ConsistencyResult } from './ConsistencyChecker.js';
import { sleep as defaultSleep, type Sleep } from './timing.js';

export interface AggressiveFallbackOptions {
  rounds: number;
  roundDelayMs: number;
  /** One full consistency check (fresh samples every call). */
  check: (signal?: AbortSignal) => Promise<ConsistencyResult | null>;
  signal?: AbortSignal;
  sleep?: Sleep;
  verbose?: boolean;
}

/**
 * Rapid re-checks after a run of misses. Each round waits `roundDelayMs`
 * after the previous attempt, then runs a full consistency check; the
 * first agreeing round wins.
 */
export async function runAggressiveFallback(opts: AggressiveFallbackOptions): Promise<ConsistencyResult | null> {
  const sleep = opts.sleep ?? defaultSleep;

  for (let round = 1; round <= opts.rounds; round++) {
    await sleep(opts.roundDelayMs, opts.signal);
    if (opts.verbose) {
      console.log(`[recognize] Aggressive check ${round}/${opts.rounds}`);
    }
    const result = await opts.check(opts.signal);
    if (result) return result;
  }

  return null;
}
