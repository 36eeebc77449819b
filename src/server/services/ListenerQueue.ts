/**
 * ListenerQueue — one bounded FIFO per registered listener.
 *
 * The run loop only ever calls push(), which never awaits the listener, so
 * a slow WebSocket client or terminal redraw cannot stall a detection
 * cycle. When the queue is full the oldest undelivered message is evicted
 * and push() reports it; the owner decides how loudly to complain.
 */

import { describeError } from '../../errors.js';

export type Deliver<T> = (msg: T) => void | Promise<void>;

export class ListenerQueue<T> {
  private queue: T[] = [];
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private droppedCount = 0;

  constructor(
    private readonly deliver: Deliver<T>,
    private readonly capacity: number,
    private readonly label: string = 'listener',
  ) {
    if (capacity < 1) throw new Error('ListenerQueue capacity must be >= 1');
  }

  /** Enqueue a message. Returns false when an older message had to be evicted. */
  push(msg: T): boolean {
    if (this.closed) return true;

    let evicted = false;
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedCount++;
      evicted = true;
    }
    this.queue.push(msg);

    if (!this.draining) {
      this.draining = true;
      void this.drain();
    }
    return !evicted;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Resolves once every queued message has been handed to the listener. */
  drained(): Promise<void> {
    if (!this.draining) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop delivering. Queued messages are discarded. */
  close(): void {
    this.closed = true;
    this.queue = [];
  }

  private async drain(): Promise<void> {
    // deliver after push() has returned to the run loop
    await Promise.resolve();
    while (this.queue.length > 0 && !this.closed) {
      const msg = this.queue[0];
      this.queue.shift();
      try {
        await this.deliver(msg);
      } catch (err) {
        console.warn(`[session] ${this.label} threw: ${describeError(err)}`);
      }
    }
    this.draining = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
