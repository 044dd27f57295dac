import type { DocumentStore } from "../documentStore.js";
import type { Ranker } from "../ranker.js";
import type { Document, RankedDocument, Term, Title } from "../types.js";

/** Fixed-point scale applied before truncating each per-term score to an integer. */
export const SCORE_SCALE = 100000;

export function idf(docCount: number, df: number): number {
  return Math.log10((docCount + 1) / (df + 1));
}

/** Orders strings by their UTF-8 bytes, i.e. by code point. */
function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

/** Descending by score, then path, then title. */
export function compareRanked(a: RankedDocument, b: RankedDocument): number {
  return b.score - a.score || compareBytes(b.path, a.path) || compareBytes(b.title, a.title);
}

/**
 * Integer TF-IDF ranker:
 * - every query term is scored on its own, duplicates included
 * - each (term, document) contribution is truncated to an integer before summing
 * - the sum is divided (integer division) by the number of query terms
 * - no document length normalization
 */
export class TfIdfRanker implements Ranker {
  rank(store: DocumentStore, queryTerms: readonly Term[]): RankedDocument[] {
    if (queryTerms.length === 0) return [];

    const docCount = store.documentCount;
    const accumulated = new Map<Title, { doc: Document; score: number }>();

    for (const term of queryTerms) {
      const matching: Array<{ doc: Document; tf: number }> = [];
      for (const doc of store.documents()) {
        const tf = doc.termFrequency.get(term);
        if (tf !== undefined) matching.push({ doc, tf });
      }
      if (matching.length === 0) continue;

      const termIdf = idf(docCount, matching.length);
      for (const { doc, tf } of matching) {
        const raw = Math.floor(SCORE_SCALE * termIdf * tf);
        // negative and NaN contributions count as zero
        const score = raw > 0 ? raw : 0;
        const acc = accumulated.get(doc.title);
        if (acc) acc.score += score;
        else accumulated.set(doc.title, { doc, score });
      }
    }

    const ranked: RankedDocument[] = [];
    for (const { doc, score } of accumulated.values()) {
      ranked.push({ score: Math.floor(score / queryTerms.length), path: doc.path, title: doc.title });
    }
    ranked.sort(compareRanked);
    return ranked;
  }
}
