export type IndexErrorCode =
  | "CORRUPTED_STREAM"
  | "UNKNOWN_RECORD_TAG"
  | "FIELD_TOO_LONG"
  | "DUPLICATE_TITLE"
  | "INVALID_COUNT"
  | "LOCK_FAILURE"
  | "INTERNAL_CONSISTENCY";

export abstract class IndexError extends Error {
  abstract readonly code: IndexErrorCode;
}

export class CorruptedStreamError extends IndexError {
  readonly code = "CORRUPTED_STREAM";

  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(`${message} at byte ${offset}; snapshot is likely corrupted`);
    this.name = "CorruptedStreamError";
  }
}

export class UnknownRecordTagError extends IndexError {
  readonly code = "UNKNOWN_RECORD_TAG";

  constructor(
    readonly tag: number,
    readonly offset: number,
  ) {
    super(`Unknown record tag 0x${tag.toString(16).padStart(2, "0")} at byte ${offset}`);
    this.name = "UnknownRecordTagError";
  }
}

export class FieldTooLongError extends IndexError {
  readonly code = "FIELD_TOO_LONG";

  constructor(
    readonly field: string,
    readonly byteLength: number,
    readonly maxBytes: number,
  ) {
    super(`${field} is ${byteLength} bytes long; at most ${maxBytes} can be encoded`);
    this.name = "FieldTooLongError";
  }
}

export class DuplicateTitleError extends IndexError {
  readonly code = "DUPLICATE_TITLE";

  constructor(
    readonly title: string,
    readonly existingPath: string,
    readonly offendingPath: string,
  ) {
    super(
      `Found document with identical title ${JSON.stringify(title)}: submitted ${JSON.stringify(offendingPath)}, ` +
        `but found ${JSON.stringify(existingPath)}; pick a dupe policy of replace, rename or ignore`,
    );
    this.name = "DuplicateTitleError";
  }
}

export class InvalidCountError extends IndexError {
  readonly code = "INVALID_COUNT";

  constructor(
    readonly term: string,
    readonly count: number,
  ) {
    super(`occurrence count of ${JSON.stringify(term)} must be a positive integer, got ${count}`);
    this.name = "InvalidCountError";
  }
}

export class LockFailureError extends IndexError {
  readonly code = "LOCK_FAILURE";

  constructor(message: string) {
    super(message);
    this.name = "LockFailureError";
  }
}

export class InternalConsistencyError extends IndexError {
  readonly code = "INTERNAL_CONSISTENCY";

  constructor(message: string) {
    super(message);
    this.name = "InternalConsistencyError";
  }
}
