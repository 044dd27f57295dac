import type { DocumentStore } from "./documentStore.js";
import type { StringPool } from "./stringPool.js";

/** Tag byte that opens every record of a snapshot. */
export const RecordTag = {
  GlobalTerm: 0x01,
  DocTitle: 0x02,
  DocPath: 0x03,
  DocTerm: 0x04,
} as const;

export type RecordTag = (typeof RecordTag)[keyof typeof RecordTag];

/** Longest string (in UTF-8 bytes) a u16 length field can describe. */
export const MAX_FIELD_BYTES = 0xffff;

/**
 * One self-describing snapshot record.
 *
 * Layout (little-endian), after the tag byte:
 * - GlobalTerm: len:u16, count:u64, text[len]
 * - DocTitle:   len:u16, text[len]
 * - DocPath:    len:u16, text[len]
 * - DocTerm:    len:u16, freq:f64, text[len]
 */
export type SnapshotRecord =
  | { kind: "globalTerm"; text: string; count: number }
  | { kind: "docTitle"; text: string }
  | { kind: "docPath"; text: string }
  | { kind: "docTerm"; text: string; freq: number };

/**
 * Converts a whole store to and from its snapshot bytes.
 *
 * Contract notes:
 * - `decode(encode(s))` equals `s` when compared by text
 * - decode either returns a complete store or throws; it never hands back a partial one
 * - an empty buffer decodes to an empty store
 */
export interface SnapshotCodec {
  encode(store: DocumentStore): Buffer;
  decode(bytes: Uint8Array, pool: StringPool): DocumentStore;
}
