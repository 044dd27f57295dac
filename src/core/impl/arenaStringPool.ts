import { InternalConsistencyError } from "../errors.js";
import type { StringPool } from "../stringPool.js";
import type { Term } from "../types.js";

/**
 * Bump-allocated string pool.
 *
 * Data structure:
 * - arena: handle -> text, only ever appended to
 * - index: text -> handle
 *
 * Entries live as long as the pool does. Vocabulary is bounded by the corpus, so the
 * pool never frees anything; drop the whole pool (and every store using it) instead.
 */
export class ArenaStringPool implements StringPool {
  private readonly arena: string[] = [];
  private readonly index = new Map<string, Term>();

  get size(): number {
    return this.arena.length;
  }

  intern(text: string): Term {
    const existing = this.index.get(text);
    if (existing !== undefined) return existing;

    const term = this.arena.length;
    this.arena.push(text);
    this.index.set(text, term);
    return term;
  }

  lookup(text: string): Term | undefined {
    return this.index.get(text);
  }

  resolve(term: Term): string {
    const text = this.arena[term];
    if (text === undefined) {
      throw new InternalConsistencyError(`Handle ${term} was not issued by this pool (size ${this.arena.length})`);
    }
    return text;
  }
}
