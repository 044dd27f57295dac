/** Shared core types used by module contracts. */

/** Interned handle of a normalized word. Only meaningful for the pool that issued it. */
export type Term = number;

export type Title = string;

/** How `ingest` resolves a title that is already present in the store. */
export type DupePolicy = "fail" | "replace" | "rename" | "ignore";

export const DUPE_POLICIES: readonly DupePolicy[] = ["fail", "replace", "rename", "ignore"];

export function isDupePolicy(v: string): v is DupePolicy {
  return (DUPE_POLICIES as readonly string[]).includes(v);
}

export interface Document {
  title: Title;
  path: string;
  /** occurrences of the term divided by the number of distinct terms in the document */
  termFrequency: ReadonlyMap<Term, number>;
}

/** Input handed to the store by the ingestion side. */
export interface DocumentInput {
  title: Title;
  path: string;
  /** raw occurrence count per term */
  occurrences: ReadonlyMap<Term, number>;
}

export interface IngestOutcome {
  status: "inserted" | "replaced" | "renamed" | "ignored";
  /** key the document ends up stored under */
  title: Title;
}

export interface RankedDocument {
  score: number;
  path: string;
  title: Title;
}

/** Text-keyed copy of a document, independent of the pool's handle numbering. */
export interface DocumentView {
  title: Title;
  path: string;
  termFrequency: Record<string, number>;
}

export interface StoreView {
  globalTermCount: Record<string, number>;
  documents: Record<Title, DocumentView>;
}
