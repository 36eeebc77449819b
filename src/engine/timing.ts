import { setTimeout as delay } from 'node:timers/promises';
import { TimeoutError } from '../errors.js';

/** Abortable sleep. Rejects with an AbortError when `signal` fires. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(Math.max(0, ms), undefined, { signal });
};

export const secondsToMs = (sec: number) => Math.round(sec * 1000);

/**
 * Run `fn` with a child AbortSignal that fires when either the parent
 * signal aborts or `timeoutMs` elapses. The returned promise settles as
 * soon as the signal fires, even if `fn` ignores it.
 */
export async function withTimeout<T>(
  what: string,
  timeoutMs: number,
  signal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  signal?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new TimeoutError(what, timeoutMs)), timeoutMs);
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), cancelled]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onParentAbort);
  }
}
