/**
 * Broadcast Stream
 *
 * Synchronous multicast stream. Every value added is handed to each observer
 * subscribed at that moment, in subscription order. There is no per-observer
 * queue: an observer that can't keep up coalesces on its own side.
 *
 * Delivery is not re-entrant. A value added while another is being delivered
 * (an observer writing back to its source) waits until every observer has the
 * current one, so all observers see values in the order they were added.
 *
 * A stream can be seeded once with a first value. The seed is delivered to
 * every observer that attaches before the next `add()`, which drops it. This
 * lets an owner publish its initial state before anyone has subscribed.
 */

import { StreamClosedError } from './errors';

export type StreamListener<T> = (value: T) => void;

/**
 * Read side of a broadcast stream, handed out to consumers
 */
export interface StateStream<T> {
  /**
   * @param onData Called with each value published after subscribing
   * @param onDone Called once when the stream closes
   * @returns Unsubscribe function (safe to call more than once)
   */
  listen(onData: StreamListener<T>, onDone?: () => void): () => void;
}

interface Observer<T> {
  onData: StreamListener<T>;
  onDone?: () => void;
}

export class BroadcastStream<T> implements StateStream<T> {
  private observers: Set<Observer<T>> = new Set();
  private seedValue: { value: T } | null = null;
  private pending: T[] = [];
  private delivering = false;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get observerCount(): number {
    return this.observers.size;
  }

  listen(onData: StreamListener<T>, onDone?: () => void): () => void {
    if (this.closed) {
      onDone?.();
      return () => {};
    }

    const observer: Observer<T> = { onData, onDone };
    this.observers.add(observer);

    if (this.seedValue !== null) {
      this.deliver(observer, this.seedValue.value);
    }

    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * Hold a first value for observers that attach before the next add()
   */
  seed(value: T): void {
    if (this.closed) {
      throw new StreamClosedError('seed');
    }
    this.seedValue = { value };
  }

  add(value: T): void {
    if (this.closed) {
      throw new StreamClosedError('add');
    }
    this.seedValue = null;
    this.pending.push(value);

    if (this.delivering) return;

    this.delivering = true;
    try {
      // pending can grow while draining
      for (let i = 0; i < this.pending.length && !this.closed; i++) {
        const next = this.pending[i];
        for (const observer of [...this.observers]) {
          if (this.closed) break;
          this.deliver(observer, next);
        }
      }
    } finally {
      this.pending = [];
      this.delivering = false;
    }
  }

  /**
   * Signal done to every observer and release them
   */
  close(): void {
    if (this.closed) return;

    this.closed = true;
    this.seedValue = null;
    this.pending = [];

    const observers = [...this.observers];
    this.observers.clear();
    for (const observer of observers) {
      try {
        observer.onDone?.();
      } catch (e) {
        console.error('[BroadcastStream] onDone error:', e);
      }
    }
  }

  private deliver(observer: Observer<T>, value: T): void {
    try {
      observer.onData(value);
    } catch (e) {
      console.error('[BroadcastStream] Observer error:', e);
    }
  }
}
