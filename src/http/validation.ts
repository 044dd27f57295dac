import { MAX_FIELD_BYTES } from "../core/codec.js";
import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/** Parses a base-10 integer query parameter; `undefined` when absent or malformed. */
export function parseIntParam(v: string | null): number | undefined {
  if (v === null || !/^\d+$/.test(v)) return undefined;
  return Number(v);
}

/** Non-empty string short enough to be persisted in a snapshot field. */
export function checkField(errors: FieldError[], path: string, v: unknown): string | undefined {
  const s = asString(v);
  if (!s) {
    pushErr(errors, path, "must be a non-empty string");
    return undefined;
  }
  if (Buffer.byteLength(s, "utf8") > MAX_FIELD_BYTES) {
    pushErr(errors, path, `must be at most ${MAX_FIELD_BYTES} bytes`);
    return undefined;
  }
  return s;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
