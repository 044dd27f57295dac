import { MAX_FIELD_BYTES } from "../codec.js";
import { DuplicateTitleError, FieldTooLongError, InvalidCountError } from "../errors.js";
import type { DocumentStore } from "../documentStore.js";
import type { StringPool } from "../stringPool.js";
import type {
  Document,
  DocumentInput,
  DocumentView,
  DupePolicy,
  IngestOutcome,
  StoreView,
  Term,
  Title,
} from "../types.js";

export interface StoreSeed {
  globalTermCount?: Iterable<[Term, number]>;
  documents?: Iterable<Document>;
}

/**
 * Computes tf(t) = occurrences(t) / distinct terms in the document.
 *
 * The denominator is the distinct term count, not the total number of occurrences.
 */
export function termFrequencies(occurrences: ReadonlyMap<Term, number>): Map<Term, number> {
  const distinct = occurrences.size;
  const tf = new Map<Term, number>();
  for (const [term, n] of occurrences) tf.set(term, n / distinct);
  return tf;
}

/**
 * In-memory document store.
 *
 * Data structure:
 * - title -> Document
 * - term -> occurrences across every ingested document
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<Title, Document>();
  private readonly globalTermCount = new Map<Term, number>();

  constructor(
    readonly pool: StringPool,
    seed?: StoreSeed,
  ) {
    for (const [term, count] of seed?.globalTermCount ?? []) this.globalTermCount.set(term, count);
    for (const doc of seed?.documents ?? []) this.docs.set(doc.title, doc);
  }

  get documentCount(): number {
    return this.docs.size;
  }

  get distinctTermCount(): number {
    return this.globalTermCount.size;
  }

  ingest(input: DocumentInput, dupePolicy: DupePolicy = "fail"): IngestOutcome {
    const existing = this.docs.get(input.title);
    let title = input.title;
    let status: IngestOutcome["status"] = "inserted";

    if (existing) {
      switch (dupePolicy) {
        case "fail":
          throw new DuplicateTitleError(input.title, existing.path, input.path);
        case "ignore":
          return { status: "ignored", title: input.title };
        case "replace":
          status = "replaced";
          break;
        case "rename":
          title = this.freeTitle(input.title);
          status = "renamed";
          break;
      }
    }

    // nothing is touched until the document is known to fit in a snapshot
    this.check(title, input);

    if (existing && status === "replaced") {
      this.docs.delete(input.title);
      this.forgetCounts(existing);
    }
    this.docs.set(title, { title, path: input.path, termFrequency: termFrequencies(input.occurrences) });
    for (const [term, n] of input.occurrences) {
      this.globalTermCount.set(term, (this.globalTermCount.get(term) ?? 0) + n);
    }

    return { status, title };
  }

  get(title: Title): Document | undefined {
    return this.docs.get(title);
  }

  has(title: Title): boolean {
    return this.docs.has(title);
  }

  documents(): IterableIterator<Document> {
    return this.docs.values();
  }

  termCount(term: Term): number {
    return this.globalTermCount.get(term) ?? 0;
  }

  globalTermCounts(): IterableIterator<[Term, number]> {
    return this.globalTermCount.entries();
  }

  view(): StoreView {
    const counts = Array.from(this.globalTermCount, ([term, count]) => [this.pool.resolve(term), count] as const);
    const docs = Array.from(this.docs.values(), (doc) => [doc.title, viewDocument(doc, this.pool)] as const);
    return { globalTermCount: Object.fromEntries(counts), documents: Object.fromEntries(docs) };
  }

  private check(title: Title, input: DocumentInput): void {
    fitField("document title", title);
    fitField("document path", input.path);
    for (const [term, n] of input.occurrences) {
      const text = this.pool.resolve(term);
      fitField("document term", text);
      if (!Number.isSafeInteger(n) || n < 1) throw new InvalidCountError(text, n);
    }
  }

  /** `title-1`, then `title-2`, ... until one is unused. */
  private freeTitle(title: Title): Title {
    let n = 1;
    while (this.docs.has(`${title}-${n}`)) n++;
    return `${title}-${n}`;
  }

  /** Subtracts a replaced document's occurrences, recovered from its frequencies. */
  private forgetCounts(doc: Document): void {
    const distinct = doc.termFrequency.size;
    for (const [term, freq] of doc.termFrequency) {
      const left = (this.globalTermCount.get(term) ?? 0) - Math.round(freq * distinct);
      if (left > 0) this.globalTermCount.set(term, left);
      else this.globalTermCount.delete(term);
    }
  }
}

function fitField(field: string, text: string): void {
  const bytes = Buffer.byteLength(text, "utf8");
  if (bytes > MAX_FIELD_BYTES) throw new FieldTooLongError(field, bytes, MAX_FIELD_BYTES);
}

export function viewDocument(doc: Document, pool: StringPool): DocumentView {
  // fromEntries defines own properties, so a term such as "__proto__" stays a plain key
  const entries = Array.from(doc.termFrequency, ([term, freq]) => [pool.resolve(term), freq] as const);
  return { title: doc.title, path: doc.path, termFrequency: Object.fromEntries(entries) };
}
