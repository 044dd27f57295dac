import type { Term } from "./types.js";

/**
 * Append-only interning table: text <-> small integer handle.
 *
 * Contract notes:
 * - `intern` returns the same handle for equal text, and distinct handles for distinct text
 * - handles are allocated densely from 0 and never reused or freed
 * - `resolve` only accepts handles issued by the same pool
 */
export interface StringPool {
  intern(text: string): Term;
  resolve(term: Term): string;
  /** Handle for `text` if it was interned before, without allocating one. */
  lookup(text: string): Term | undefined;
  readonly size: number;
}
