import { LockFailureError } from "../errors.js";
import type { ReadWriteLock } from "../lock.js";

type Mode = "read" | "write";

interface Waiter {
  mode: Mode;
  resolve: () => void;
  reject: (e: Error) => void;
}

/**
 * Promise-based reader/writer lock.
 *
 * Grants are FIFO with writer preference: a reader arriving while anyone is queued waits
 * its turn, so a stream of searches cannot starve an ingestion.
 */
export class AsyncReadWriteLock implements ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];
  private closedReason: string | undefined;

  get closed(): boolean {
    return this.closedReason !== undefined;
  }

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  /** Rejects everything still queued. Holders already inside finish normally. */
  close(reason = "lock closed"): void {
    if (this.closedReason !== undefined) return;
    this.closedReason = reason;
    for (const w of this.queue.splice(0)) w.reject(new LockFailureError(reason));
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.closedReason !== undefined) return Promise.reject(new LockFailureError(this.closedReason));
    if (this.queue.length === 0 && this.grantable(mode)) {
      this.grant(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => this.queue.push({ mode, resolve, reject }));
  }

  private release(mode: Mode): void {
    if (mode === "read") this.readers--;
    else this.writer = false;

    let next = this.queue[0];
    while (next && this.grantable(next.mode)) {
      this.queue.shift();
      this.grant(next.mode);
      next.resolve();
      if (next.mode === "write") break;
      next = this.queue[0];
    }
  }

  private grantable(mode: Mode): boolean {
    return mode === "read" ? !this.writer : !this.writer && this.readers === 0;
  }

  private grant(mode: Mode): void {
    if (mode === "read") this.readers++;
    else this.writer = true;
  }
}
