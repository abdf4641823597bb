/**
 * Debouncer
 * 
 * One pending timer per key. A new trigger for a key cancels the pending
 * one, so the callback runs once per quiet period with the latest value.
 * The timer map is only touched from the event loop.
 */

import { createLogger, type Logger } from '@dashsync/utils';

export type DebounceCallback<T> = (value: T) => Promise<void> | void;

export class Debouncer<T> {
  private readonly timers: Map<string, NodeJS.Timeout> = new Map();
  private readonly callback: DebounceCallback<T>;
  private readonly delayMs: number;
  private readonly log: Logger;

  constructor(callback: DebounceCallback<T>, delayMs: number, logger?: Logger) {
    this.callback = callback;
    this.delayMs = delayMs;
    this.log = logger ?? createLogger({ component: 'debouncer' });
  }

  /**
   * Schedule the callback for `key`, replacing any pending one
   */
  trigger(key: string, value: T): void {
    const existing = this.timers.get(key);
    if (existing) {
      clearTimeout(existing);
    }

    const timer = setTimeout(() => {
      this.timers.delete(key);
      this.fire(key, value);
    }, this.delayMs);

    this.timers.set(key, timer);
  }

  /**
   * Drop the pending callback for `key`. Returns whether one was pending.
   */
  cancel(key: string): boolean {
    const existing = this.timers.get(key);
    if (!existing) {
      return false;
    }

    clearTimeout(existing);
    this.timers.delete(key);
    return true;
  }

  isPending(key: string): boolean {
    return this.timers.has(key);
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  /**
   * Drop every pending callback
   */
  clear(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private fire(key: string, value: T): void {
    void Promise.resolve()
      .then(() => this.callback(value))
      .catch((error: unknown) => {
        this.log.error(
          { key, err: error instanceof Error ? error.message : String(error) },
          'Debounced callback failed'
        );
      });
  }
}
