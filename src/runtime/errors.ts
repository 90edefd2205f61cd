// === Errors ===

/** Base class for every failure raised while walking a byte stream. */
export class DecodeError extends Error {
  constructor(
    message: string,
    /** Offset of the read that failed. */
    readonly offset: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BoundsError extends DecodeError {
  constructor(
    offset: number,
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      `reading ${requested} bytes at offset ${offset} exceeds buffer (${available} remaining)`,
      offset,
    );
  }
}

export class EncodingError extends DecodeError {
  constructor(offset: number, readonly length: number) {
    super(`invalid UTF-8 in ${length} bytes at offset ${offset}`, offset);
  }
}

export class DepthLimitError extends DecodeError {
  constructor(offset: number, readonly limit: number) {
    super(`record nesting exceeds ${limit} levels at offset ${offset}`, offset);
  }
}

export class TrailingBytesError extends DecodeError {
  constructor(offset: number, readonly trailing: number) {
    super(`${trailing} unread bytes after document end at offset ${offset}`, offset);
  }
}

/** A schema descriptor that cannot be turned into a decoder. */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}
