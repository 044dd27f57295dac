import type { DocumentStore } from "./documentStore.js";
import type { RankedDocument, Term } from "./types.js";

/**
 * Scores documents for a query.
 *
 * Query terms are taken in order and duplicates count once per occurrence.
 * Documents matching no query term are left out of the result.
 */
export interface Ranker {
  rank(store: DocumentStore, queryTerms: readonly Term[]): RankedDocument[];
}
