/**
 * Bounded single-consumer channel between channel adapters and the
 * dedup/debounce stage. Producers never wait: a full channel rejects the push.
 */

import { DebugLogger, type Logger } from '@laneway/core/debug-logger';

export const DEFAULT_INBOUND_CAPACITY = 1000;

export interface InboundChannelOptions {
  capacity?: number;
  logger?: Logger;
  name?: string;
}

export class InboundChannel<T> {
  private items: T[] = [];
  private waiter: (() => void) | null = null;
  private drainWaiters: Array<() => void> = [];
  private busy = false;
  private closed = false;
  private consuming = false;
  private rejected = 0;
  private readonly capacity: number;
  private readonly logger: Logger;
  private readonly name: string;

  constructor(options: InboundChannelOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_INBOUND_CAPACITY);
    this.logger = options.logger ?? new DebugLogger('InboundChannel');
    this.name = options.name ?? 'inbound';
  }

  /**
   * Enqueue without blocking
   *
   * @returns false when the channel is closed or full
   */
  push(item: T): boolean {
    if (this.closed) {
      this.logger.warn(`Push rejected: channel ${this.name} is closed`);
      return false;
    }
    if (this.items.length >= this.capacity) {
      this.rejected++;
      this.logger.warn(
        `Push rejected: channel ${this.name} full (capacity=${this.capacity}, rejected=${this.rejected})`
      );
      return false;
    }
    this.items.push(item);
    this.wake();
    return true;
  }

  /**
   * Run the single consumer loop until the channel is closed and drained.
   * Handler errors are logged and the loop moves on to the next item.
   */
  async consume(handler: (item: T) => void | Promise<void>): Promise<void> {
    if (this.consuming) {
      throw new Error(`Channel ${this.name} already has a consumer`);
    }
    this.consuming = true;
    try {
      for (;;) {
        const item = this.items.shift();
        if (item !== undefined) {
          this.busy = true;
          try {
            await handler(item);
          } catch (error) {
            this.logger.error(`Consumer failed on ${this.name}:`, error);
          } finally {
            this.busy = false;
          }
          continue;
        }
        this.notifyDrained();
        if (this.closed) {
          return;
        }
        await new Promise<void>((resolve) => {
          this.waiter = resolve;
        });
      }
    } finally {
      this.consuming = false;
      this.notifyDrained();
    }
  }

  /**
   * Resolves once the backlog is empty and no item is being handled
   */
  whenDrained(): Promise<void> {
    if (this.items.length === 0 && !this.busy) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting input; the consumer exits once the backlog is handled
   */
  close(): void {
    this.closed = true;
    this.wake();
  }

  get size(): number {
    return this.items.length;
  }

  get rejectedCount(): number {
    return this.rejected;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
