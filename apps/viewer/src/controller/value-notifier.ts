/**
 * Value Notifier
 *
 * Small observable value holder: read the current value, replace it with
 * change detection, and subscribe to payload-free change notifications.
 * Listeners re-read `value` when notified.
 *
 * The value held before the last accepted change is kept as `previous`. It is
 * updated before listeners run, so a listener sees both sides of the change.
 *
 * The view controller keeps its snapshot here and hangs its stream bridge off
 * the listener set, so there is a single place where a change is accepted.
 */

import { ControllerDisposedError } from './errors';

export type Equality<T> = (a: T, b: T) => boolean;

export interface SetOptions {
  /** Notify even when the new value equals the current one */
  force?: boolean;
  /** Leave `previous` where it is (e.g. when restoring a saved value) */
  keepPrevious?: boolean;
}

export class ValueNotifier<T> {
  private current: T;
  private prior: T;
  private readonly equals: Equality<T>;
  private listeners: Set<() => void> = new Set();
  private disposed = false;

  constructor(initialValue: T, equals: Equality<T> = Object.is) {
    this.current = initialValue;
    this.prior = initialValue;
    this.equals = equals;
  }

  get value(): T {
    return this.current;
  }

  /**
   * Value before the last accepted change (the initial value until then)
   */
  get previous(): T {
    return this.prior;
  }

  get hasListeners(): boolean {
    return this.listeners.size > 0;
  }

  /**
   * Replace the value and notify listeners.
   *
   * @returns false when the value was equal and nothing happened
   */
  set(next: T, options: SetOptions = {}): boolean {
    this.assertActive('set');

    if (!options.force && this.equals(this.current, next)) {
      return false;
    }

    if (!options.keepPrevious) {
      this.prior = this.current;
    }
    this.current = next;
    this.notifyListeners();
    return true;
  }

  /**
   * @returns Unsubscribe function
   */
  addListener(listener: () => void): () => void {
    this.assertActive('addListener');
    this.listeners.add(listener);
    return () => this.removeListener(listener);
  }

  removeListener(listener: () => void): void {
    this.listeners.delete(listener);
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }

  private notifyListeners(): void {
    // Copy so listeners can unsubscribe while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (e) {
        console.error('[ValueNotifier] Listener error:', e);
      }
    }
  }

  private assertActive(operation: string): void {
    if (this.disposed) {
      throw new ControllerDisposedError('ValueNotifier', operation);
    }
  }
}
