export { ArenaStringPool } from "./arenaStringPool.js";
export { MemoryDocumentStore, termFrequencies, viewDocument, type StoreSeed } from "./memoryDocumentStore.js";
export { BinarySnapshotCodec, decodeRecords, encodeRecord, encodeRecords, storeRecords } from "./binarySnapshotCodec.js";
export { TfIdfRanker, SCORE_SCALE, compareRanked, idf } from "./tfidfRanker.js";
export { AsyncReadWriteLock } from "./asyncRwLock.js";
export { StemmingTokenizer, type Stem } from "./stemmingTokenizer.js";
