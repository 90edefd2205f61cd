import { BoundsError, DepthLimitError, EncodingError } from "./errors.js";

export const BYTE_LEN = 1;
export const SHORT_LEN = 2;
export const INT_LEN = 4;
export const LONG_LEN = 8;
export const FLOAT_LEN = 4;
export const DOUBLE_LEN = 8;

export const DEFAULT_MAX_DEPTH = 256;

const _td = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export interface CursorOptions {
  /** Deepest record nesting a decode may reach before it fails. */
  maxDepth?: number;
  /** Starting offset. */
  position?: number;
}

/**
 * Sequential little-endian reader over one immutable buffer.
 *
 * Every read either advances the position by exactly its width or throws;
 * after a throw the position is unspecified and the cursor should be
 * discarded.
 */
export class Cursor {
  readonly maxDepth: number;

  private readonly _b: Uint8Array;
  private readonly _v: DataView;
  private _p: number;
  private _depth = 0;

  constructor(data: Uint8Array, options: CursorOptions = {}) {
    this._b = data;
    this._v = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this._p = 0;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (options.position !== undefined) this.seek(options.position);
  }

  get position(): number { return this._p; }
  get length(): number { return this._b.length; }
  get remaining(): number { return this._b.length - this._p; }
  get eof(): boolean { return this._p >= this._b.length; }
  get depth(): number { return this._depth; }

  seek(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this._b.length) {
      throw new RangeError(`position ${position} out of range 0..${this._b.length}`);
    }
    this._p = position;
  }

  skip(count: number): void {
    this._take(count);
  }

  // --- Fixed width ---

  readU8(): number { return this._b[this._take(BYTE_LEN)]; }
  readI8(): number { const b = this.readU8(); return b > 127 ? b - 256 : b; }
  readBool(): boolean { return this.readU8() !== 0; }

  readI16(): number { return this._v.getInt16(this._take(SHORT_LEN), true); }
  readU16(): number { return this._v.getUint16(this._take(SHORT_LEN), true); }
  readI32(): number { return this._v.getInt32(this._take(INT_LEN), true); }
  readU32(): number { return this._v.getUint32(this._take(INT_LEN), true); }
  readI64(): bigint { return this._v.getBigInt64(this._take(LONG_LEN), true); }
  readU64(): bigint { return this._v.getBigUint64(this._take(LONG_LEN), true); }
  readF32(): number { return this._v.getFloat32(this._take(FLOAT_LEN), true); }
  readF64(): number { return this._v.getFloat64(this._take(DOUBLE_LEN), true); }

  // --- Variable width ---

  /** Reads exactly `length` bytes as UTF-8. The length prefix is the caller's. */
  readUtf8(length: number): string {
    const start = this._take(length);
    try {
      return _td.decode(this._b.subarray(start, start + length));
    } catch (err) {
      if (err instanceof TypeError) throw new EncodingError(start, length);
      throw err;
    }
  }

  readBytes(length: number): Uint8Array {
    const start = this._take(length);
    return this._b.slice(start, start + length);
  }

  // --- Nesting ---

  /** Runs `fn` one record level deeper, failing past `maxDepth`. */
  descend<T>(fn: () => T): T {
    if (this._depth >= this.maxDepth) throw new DepthLimitError(this._p, this.maxDepth);
    this._depth++;
    try {
      return fn();
    } finally {
      this._depth--;
    }
  }

  /** Checks that `size` bytes remain, advances past them and returns where they start. */
  private _take(size: number): number {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`invalid read size ${size}`);
    }
    const start = this._p;
    if (size > this._b.length - start) {
      throw new BoundsError(start, size, this._b.length - start);
    }
    this._p = start + size;
    return start;
  }
}
