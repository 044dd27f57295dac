import type { StringPool } from "./stringPool.js";
import type { Document, DocumentInput, DupePolicy, IngestOutcome, StoreView, Term, Title } from "./types.js";

/**
 * Authoritative index state: documents keyed by title plus a corpus-wide occurrence counter.
 *
 * Contract notes:
 * - `ingest` is all-or-nothing; a rejected call leaves the store untouched
 * - documents are never patched, only inserted or replaced whole
 * - every handle in the store was issued by `pool`
 */
export interface DocumentStore {
  readonly pool: StringPool;

  ingest(input: DocumentInput, dupePolicy?: DupePolicy): IngestOutcome;

  get(title: Title): Document | undefined;
  has(title: Title): boolean;
  documents(): IterableIterator<Document>;
  readonly documentCount: number;

  /** Occurrences of `term` summed over every ingested document. */
  termCount(term: Term): number;
  globalTermCounts(): IterableIterator<[Term, number]>;
  readonly distinctTermCount: number;

  view(): StoreView;
}
