import {
  ArenaStringPool,
  AsyncReadWriteLock,
  BinarySnapshotCodec,
  MemoryDocumentStore,
  StemmingTokenizer,
  TfIdfRanker,
  viewDocument,
} from "../core/impl/index.js";
import type { SnapshotCodec } from "../core/codec.js";
import type { DocumentStore } from "../core/documentStore.js";
import type { ReadWriteLock } from "../core/lock.js";
import type { Ranker } from "../core/ranker.js";
import type { StringPool } from "../core/stringPool.js";
import type { Tokenizer } from "../core/tokenizer.js";
import type { DocumentView, DupePolicy, IngestOutcome, RankedDocument, Term } from "../core/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";

export interface SubmitInput {
  title: string;
  path: string;
  /** already-extracted document text */
  text: string;
  dupe?: DupePolicy;
}

export interface IndexStats {
  documents: number;
  terms: number;
  internedStrings: number;
}

export interface Engine {
  submit(input: SubmitInput): Promise<IngestOutcome>;
  search(query: string, limit?: number): Promise<RankedDocument[]>;
  document(title: string): Promise<DocumentView | undefined>;
  stats(): Promise<IndexStats>;
  snapshot(): Promise<Buffer>;
  /** Encodes the final snapshot and closes the store to every later caller. */
  shutdown(): Promise<Buffer>;
}

/** Stands in for a query word the pool has never seen; no document carries it. */
const UNSEEN_TERM: Term = -1;

export interface EngineDeps {
  store: DocumentStore;
  tokenizer?: Tokenizer;
  ranker?: Ranker;
  codec?: SnapshotCodec;
  lock?: ReadWriteLock;
  logger?: Logger;
}

/** Raw occurrence count per interned term. */
export function countTerms(terms: Iterable<string>, pool: StringPool): Map<Term, number> {
  const counts = new Map<Term, number>();
  for (const t of terms) {
    const term = pool.intern(t);
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

export function createEngine(deps: EngineDeps): Engine {
  const { store } = deps;
  const tokenizer = deps.tokenizer ?? new StemmingTokenizer();
  const ranker = deps.ranker ?? new TfIdfRanker();
  const codec = deps.codec ?? new BinarySnapshotCodec();
  const lock = deps.lock ?? new AsyncReadWriteLock();
  const log = (deps.logger ?? rootLogger).child({ module: "engine" });

  return {
    async submit(input) {
      const occurrences = countTerms(tokenizer.tokenize(input.text), store.pool);
      const outcome = await lock.write(() =>
        store.ingest({ title: input.title, path: input.path, occurrences }, input.dupe),
      );
      log.info({ title: outcome.title, path: input.path, status: outcome.status, terms: occurrences.size }, "document submitted");
      return outcome;
    },

    async search(query, limit) {
      // lookup, not intern: reads must not grow the pool
      const terms = Array.from(tokenizer.tokenize(query), (t) => store.pool.lookup(t) ?? UNSEEN_TERM);
      const ranked = await lock.read(() => ranker.rank(store, terms));
      log.debug({ query, terms: terms.length, hits: ranked.length }, "search");
      return limit === undefined ? ranked : ranked.slice(0, limit);
    },

    document(title) {
      return lock.read(() => {
        const doc = store.get(title);
        return doc ? viewDocument(doc, store.pool) : undefined;
      });
    },

    stats() {
      return lock.read(() => ({
        documents: store.documentCount,
        terms: store.distinctTermCount,
        internedStrings: store.pool.size,
      }));
    },

    snapshot() {
      return lock.read(() => codec.encode(store));
    },

    async shutdown() {
      const bytes = await lock.write(() => codec.encode(store));
      lock.close("index is shut down");
      log.info({ bytes: bytes.length, documents: store.documentCount }, "final snapshot encoded");
      return bytes;
    },
  };
}

export interface OpenOptions extends Omit<EngineDeps, "store"> {
  pool?: StringPool;
}

/** Restores a store from snapshot bytes, or starts empty when there are none. */
export function openEngine(snapshot: Uint8Array | undefined, opts: OpenOptions = {}): Engine {
  const pool = opts.pool ?? new ArenaStringPool();
  const codec = opts.codec ?? new BinarySnapshotCodec();
  const store = snapshot ? codec.decode(snapshot, pool) : new MemoryDocumentStore(pool);
  (opts.logger ?? rootLogger).info(
    { documents: store.documentCount, terms: store.distinctTermCount, restored: snapshot !== undefined },
    "index opened",
  );
  return createEngine({ ...opts, store, codec });
}
