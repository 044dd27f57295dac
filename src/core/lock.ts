/**
 * Reader/writer lock guarding a whole store.
 *
 * `read` callbacks may overlap each other; a `write` callback runs alone.
 * Once closed, pending and future callers are rejected with `LockFailureError`.
 */
export interface ReadWriteLock {
  read<T>(fn: () => T | Promise<T>): Promise<T>;
  write<T>(fn: () => T | Promise<T>): Promise<T>;
  close(reason?: string): void;
  readonly closed: boolean;
}
