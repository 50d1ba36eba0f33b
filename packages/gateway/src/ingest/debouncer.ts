/**
 * Debouncer - coalesces bursts of messages into one ordered batch
 *
 * One single-shot timer per key. Every offer cancels and restarts it with the
 * window in effect at that moment; when it fires the pending list is detached
 * from the key before the flush callback runs, so anything offered during the
 * flush opens a new cycle instead of joining (or getting lost from) the old one.
 */

import { DebugLogger, type Logger } from '@laneway/core/debug-logger';

export const DEFAULT_DEBOUNCE_MS = 1000;

export type FlushHandler<T> = (key: string, batch: T[]) => void | Promise<void>;

export interface DebouncerOptions<T> {
  /** Window used when neither the offer nor windowFor supplies one (default: 1000) */
  defaultWindowMs?: number;
  /** Per-key window lookup, e.g. per-channel overrides */
  windowFor?: (key: string, item: T) => number | undefined;
  onFlush: FlushHandler<T>;
  logger?: Logger;
}

interface PendingBatch<T> {
  items: T[];
  timer: ReturnType<typeof setTimeout> | null;
  windowMs: number;
  firstOfferedAt: number;
}

export class Debouncer<T> {
  private readonly pending = new Map<string, PendingBatch<T>>();
  private readonly onFlush: FlushHandler<T>;
  private readonly logger: Logger;
  private defaultWindowMs: number;
  private windowFor?: (key: string, item: T) => number | undefined;
  private inFlight = new Set<Promise<void>>();

  constructor(options: DebouncerOptions<T>) {
    this.defaultWindowMs = Math.max(0, options.defaultWindowMs ?? DEFAULT_DEBOUNCE_MS);
    this.windowFor = options.windowFor;
    this.onFlush = options.onFlush;
    this.logger = options.logger ?? new DebugLogger('Debouncer');
  }

  /**
   * Append an item to the key's pending batch and restart its quiet-period timer
   */
  offer(key: string, item: T, windowMs?: number): void {
    const effective = Math.max(0, windowMs ?? this.windowFor?.(key, item) ?? this.defaultWindowMs);

    let batch = this.pending.get(key);
    if (!batch) {
      batch = { items: [], timer: null, windowMs: effective, firstOfferedAt: Date.now() };
      this.pending.set(key, batch);
    }
    batch.items.push(item);

    if (batch.timer) {
      clearTimeout(batch.timer);
      batch.timer = null;
    }
    batch.windowMs = effective;

    if (effective === 0) {
      this.flush(key);
      return;
    }

    batch.timer = setTimeout(() => {
      this.flush(key);
    }, effective);
  }

  /**
   * Flush one key now. Returns the number of items handed to onFlush.
   */
  flush(key: string): number {
    const batch = this.pending.get(key);
    if (!batch) {
      return 0;
    }
    if (batch.timer) {
      clearTimeout(batch.timer);
    }
    this.pending.delete(key);

    const items = batch.items;
    this.logger.debug(
      `Flush: key=${key} items=${items.length} window=${batch.windowMs}ms held=${Date.now() - batch.firstOfferedAt}ms`
    );
    this.dispatch(key, items);
    return items.length;
  }

  flushAll(): number {
    let total = 0;
    for (const key of [...this.pending.keys()]) {
      total += this.flush(key);
    }
    return total;
  }

  /**
   * Discard a key's pending items without flushing them
   */
  drop(key: string): number {
    const batch = this.pending.get(key);
    if (!batch) {
      return 0;
    }
    if (batch.timer) {
      clearTimeout(batch.timer);
    }
    this.pending.delete(key);
    this.logger.debug(`Dropped ${batch.items.length} pending item(s) for ${key}`);
    return batch.items.length;
  }

  pendingCount(key: string): number {
    return this.pending.get(key)?.items.length ?? 0;
  }

  get pendingKeys(): string[] {
    return [...this.pending.keys()];
  }

  /**
   * Swap window resolution (config hot-reload). Running timers keep the
   * window they were started with.
   */
  updateWindows(defaultWindowMs: number, windowFor?: (key: string, item: T) => number | undefined): void {
    this.defaultWindowMs = Math.max(0, defaultWindowMs);
    this.windowFor = windowFor;
  }

  /**
   * Wait for flush callbacks that are still running
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  dispose(): void {
    for (const key of [...this.pending.keys()]) {
      this.drop(key);
    }
  }

  private dispatch(key: string, items: T[]): void {
    let result: void | Promise<void>;
    try {
      result = this.onFlush(key, items);
    } catch (error) {
      this.logger.error(`Flush handler failed for ${key}:`, error);
      return;
    }
    if (result instanceof Promise) {
      const tracked: Promise<void> = result
        .catch((error: unknown) => {
          this.logger.error(`Flush handler failed for ${key}:`, error);
        })
        .finally(() => {
          this.inFlight.delete(tracked);
        });
      this.inFlight.add(tracked);
    }
  }
}
