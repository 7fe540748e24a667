/**
 * Per-session async lock: a promise chain where each holder waits for the previous tail.
 * One instance per session, so unrelated sessions never wait on each other.
 */

import { SessionBusyError } from "./errors";

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  constructor(
    private readonly sessionId: string,
    private readonly timeoutMs?: number
  ) {}

  /** Number of callers holding or queued for the lock. */
  get pending(): number {
    return this.waiting;
  }

  /**
   * Run fn once every earlier holder has released.
   * Rejects with SessionBusyError (without running fn) if the wait exceeds timeoutMs.
   */
  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    // Successors wait on both, so releasing early after a timeout keeps them ordered.
    this.tail = previous.then(() => gate);
    this.waiting++;
    try {
      await this.acquire(previous);
      return await fn();
    } finally {
      this.waiting--;
      release();
    }
  }

  private acquire(previous: Promise<void>): Promise<void> {
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === undefined) return previous;
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => reject(new SessionBusyError(this.sessionId, timeoutMs)), timeoutMs);
      void previous.then(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}
