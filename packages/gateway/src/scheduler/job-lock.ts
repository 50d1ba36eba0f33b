/**
 * In-process lock that keeps one job from overlapping with itself
 */

export interface LockInfo {
  jobId: string;
  /** Epoch ms */
  acquiredAt: number;
  /** Lock timeout in ms (0 = no timeout) */
  timeout: number;
}

export class JobLock {
  private readonly locks = new Map<string, LockInfo>();
  private readonly defaultTimeout: number;
  private readonly now: () => number;

  /**
   * @param defaultTimeout - Lock timeout in ms; a stale lock is dropped after it (0 = never)
   */
  constructor(defaultTimeout = 0, now: () => number = Date.now) {
    this.defaultTimeout = defaultTimeout;
    this.now = now;
  }

  /**
   * @returns true if acquired, false if the job already holds a live lock
   */
  acquire(jobId: string, timeout?: number): boolean {
    if (this.isLocked(jobId)) {
      return false;
    }
    this.locks.set(jobId, {
      jobId,
      acquiredAt: this.now(),
      timeout: timeout ?? this.defaultTimeout,
    });
    return true;
  }

  release(jobId: string): boolean {
    return this.locks.delete(jobId);
  }

  /**
   * Expired locks are released as a side effect
   */
  isLocked(jobId: string): boolean {
    const lock = this.locks.get(jobId);
    if (!lock) {
      return false;
    }
    if (lock.timeout > 0 && this.now() - lock.acquiredAt >= lock.timeout) {
      this.locks.delete(jobId);
      return false;
    }
    return true;
  }
}
