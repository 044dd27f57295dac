import { MAX_FIELD_BYTES, RecordTag, type SnapshotCodec, type SnapshotRecord } from "../codec.js";
import { CorruptedStreamError, FieldTooLongError, UnknownRecordTagError } from "../errors.js";
import type { DocumentStore } from "../documentStore.js";
import type { StringPool } from "../stringPool.js";
import type { Document, Term, Title } from "../types.js";
import { MemoryDocumentStore } from "./memoryDocumentStore.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

const FIELD_NAMES: Record<SnapshotRecord["kind"], string> = {
  globalTerm: "global term",
  docTitle: "document title",
  docPath: "document path",
  docTerm: "document term",
};

/** Bounds-checked little-endian cursor over a snapshot buffer. */
class ByteReader {
  offset = 0;

  constructor(private readonly buf: Buffer) {}

  get done(): boolean {
    return this.offset >= this.buf.length;
  }

  u8(): number {
    this.need(1, "record tag");
    const v = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return v;
  }

  u16(what: string): number {
    this.need(2, what);
    const v = this.buf.readUInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  u64(what: string): number {
    this.need(8, what);
    const v = this.buf.readBigUInt64LE(this.offset);
    if (v > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new CorruptedStreamError(`${what} ${v} exceeds the largest exact integer`, this.offset);
    }
    this.offset += 8;
    return Number(v);
  }

  f64(what: string): number {
    this.need(8, what);
    const v = this.buf.readDoubleLE(this.offset);
    this.offset += 8;
    return v;
  }

  text(len: number, what: string): string {
    this.need(len, what);
    const start = this.offset;
    let s: string;
    try {
      s = utf8.decode(this.buf.subarray(start, start + len));
    } catch {
      throw new CorruptedStreamError(`Invalid UTF-8 in ${what}`, start);
    }
    this.offset += len;
    return s;
  }

  private need(n: number, what: string): void {
    if (this.offset + n > this.buf.length) {
      throw new CorruptedStreamError(`Truncated ${what}: needed ${n} bytes, ${this.buf.length - this.offset} left`, this.offset);
    }
  }
}

type RecordDecoder = (r: ByteReader) => SnapshotRecord;

const decoders = new Map<number, RecordDecoder>([
  [
    RecordTag.GlobalTerm,
    (r) => {
      const len = r.u16("global term length");
      const count = r.u64("global term count");
      return { kind: "globalTerm", count, text: r.text(len, FIELD_NAMES.globalTerm) };
    },
  ],
  [RecordTag.DocTitle, (r) => ({ kind: "docTitle", text: r.text(r.u16("title length"), FIELD_NAMES.docTitle) })],
  [RecordTag.DocPath, (r) => ({ kind: "docPath", text: r.text(r.u16("path length"), FIELD_NAMES.docPath) })],
  [
    RecordTag.DocTerm,
    (r) => {
      const len = r.u16("document term length");
      const freq = r.f64("document term frequency");
      return { kind: "docTerm", freq, text: r.text(len, FIELD_NAMES.docTerm) };
    },
  ],
]);

/** Yields each record with the byte offset of its tag. Throws on the first bad record. */
export function* decodeRecords(bytes: Uint8Array): Generator<{ record: SnapshotRecord; offset: number }> {
  const reader = new ByteReader(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  while (!reader.done) {
    const offset = reader.offset;
    const tag = reader.u8();
    const decode = decoders.get(tag);
    if (!decode) throw new UnknownRecordTagError(tag, offset);
    yield { record: decode(reader), offset };
  }
}

export function encodeRecord(record: SnapshotRecord): Buffer {
  const text = Buffer.from(record.text, "utf8");
  if (text.length > MAX_FIELD_BYTES) {
    throw new FieldTooLongError(FIELD_NAMES[record.kind], text.length, MAX_FIELD_BYTES);
  }

  const head = recordHead(record, text.length);
  return Buffer.concat([head, text]);
}

function recordHead(record: SnapshotRecord, len: number): Buffer {
  switch (record.kind) {
    case "globalTerm": {
      const head = Buffer.alloc(11);
      head.writeUInt8(RecordTag.GlobalTerm, 0);
      head.writeUInt16LE(len, 1);
      head.writeBigUInt64LE(BigInt(record.count), 3);
      return head;
    }
    case "docTitle":
    case "docPath": {
      const head = Buffer.alloc(3);
      head.writeUInt8(record.kind === "docTitle" ? RecordTag.DocTitle : RecordTag.DocPath, 0);
      head.writeUInt16LE(len, 1);
      return head;
    }
    case "docTerm": {
      const head = Buffer.alloc(11);
      head.writeUInt8(RecordTag.DocTerm, 0);
      head.writeUInt16LE(len, 1);
      head.writeDoubleLE(record.freq, 3);
      return head;
    }
  }
}

export function encodeRecords(records: Iterable<SnapshotRecord>): Buffer {
  const chunks: Buffer[] = [];
  for (const record of records) chunks.push(encodeRecord(record));
  return Buffer.concat(chunks);
}

/** Every global count first, then each document as title, path and its terms. */
export function* storeRecords(store: DocumentStore): Generator<SnapshotRecord> {
  const { pool } = store;
  for (const [term, count] of store.globalTermCounts()) {
    yield { kind: "globalTerm", text: pool.resolve(term), count };
  }
  for (const doc of store.documents()) {
    yield { kind: "docTitle", text: doc.title };
    yield { kind: "docPath", text: doc.path };
    for (const [term, freq] of doc.termFrequency) {
      yield { kind: "docTerm", text: pool.resolve(term), freq };
    }
  }
}

type OpenDocument = { title: Title; path: string; termFrequency: Map<Term, number> };

/**
 * Snapshot codec for the tagged record stream.
 *
 * Decoding interns every term it reads into the given pool. The pool is append-only, so
 * a failed decode may leave unused strings behind in it; no store is returned in that case.
 */
export class BinarySnapshotCodec implements SnapshotCodec {
  encode(store: DocumentStore): Buffer {
    return encodeRecords(storeRecords(store));
  }

  decode(bytes: Uint8Array, pool: StringPool): MemoryDocumentStore {
    const globalTermCount = new Map<Term, number>();
    const documents = new Map<Title, Document>();
    let open: OpenDocument | undefined;

    for (const { record, offset } of decodeRecords(bytes)) {
      switch (record.kind) {
        case "globalTerm":
          globalTermCount.set(pool.intern(record.text), record.count);
          break;
        case "docTitle":
          if (open) documents.set(open.title, open);
          open = { title: record.text, path: "", termFrequency: new Map() };
          break;
        case "docPath":
          if (!open) throw new CorruptedStreamError("Document path record before any title record", offset);
          open.path = record.text;
          break;
        case "docTerm":
          if (!open) throw new CorruptedStreamError("Document term record before any title record", offset);
          open.termFrequency.set(pool.intern(record.text), record.freq);
          break;
      }
    }
    // the stream has no end marker; whatever is still open is the last document
    if (open) documents.set(open.title, open);

    return new MemoryDocumentStore(pool, { globalTermCount, documents: documents.values() });
  }
}
