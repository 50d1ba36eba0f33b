/**
 * Deduplicator - drops re-delivered inbound messages
 *
 * Membership test with expiry over `<provider>:<messageId>`. Entries are
 * recorded with a fixed TTL, so insertion order is also expiry order and a
 * sweep can stop at the first live entry.
 */

import { DebugLogger, type Logger } from '@laneway/core/debug-logger';

export const DEFAULT_DEDUPE_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_DEDUPE_MAX_ENTRIES = 10_000;

export interface DeduplicatorOptions {
  /** Time-to-live for a seen message id (default: 5 minutes) */
  ttlMs?: number;
  /** Hard cap on remembered ids; oldest are evicted first (default: 10000) */
  maxEntries?: number;
  now?: () => number;
  logger?: Logger;
}

export class Deduplicator {
  private readonly seen = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(options: DeduplicatorOptions = {}) {
    this.ttlMs = Math.max(1, options.ttlMs ?? DEFAULT_DEDUPE_TTL_MS);
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_DEDUPE_MAX_ENTRIES);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? new DebugLogger('Deduplicator');
  }

  /**
   * Returns true the first time a (provider, messageId) pair is seen inside the
   * TTL window, false for every repeat. A rejected repeat changes nothing.
   */
  admit(provider: string, messageId: string): boolean {
    const key = `${provider.trim().toLowerCase()}:${messageId}`;
    const now = this.now();
    const expiresAt = this.seen.get(key);

    if (expiresAt !== undefined) {
      if (expiresAt > now) {
        this.logger.debug(`Duplicate dropped: ${key}`);
        return false;
      }
      this.seen.delete(key);
    }

    this.seen.set(key, now + this.ttlMs);
    this.enforceBound();
    return true;
  }

  /**
   * Evict expired entries
   *
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, expiresAt] of this.seen) {
      if (expiresAt > now) {
        break;
      }
      this.seen.delete(key);
      removed++;
    }
    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired id(s), ${this.seen.size} remaining`);
    }
    return removed;
  }

  startSweeper(intervalMs = this.ttlMs): void {
    this.stop();
    this.sweeper = setInterval(() => this.sweep(), Math.max(1, intervalMs));
    this.sweeper.unref?.();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }

  private enforceBound(): void {
    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) {
        return;
      }
      this.seen.delete(oldest.value);
      this.logger.warn(`Dedupe cache full (${this.maxEntries}), evicted ${oldest.value}`);
    }
  }
}
