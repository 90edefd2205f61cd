const _te = new TextEncoder();

const MAX_STRING_BYTES = 0xffff;

function checkInt(v: number, min: number, max: number, what: string): void {
  if (!Number.isInteger(v) || v < min || v > max) {
    throw new RangeError(`${what} out of range: ${v}`);
  }
}

function checkBig(v: bigint, min: bigint, max: bigint, what: string): void {
  if (v < min || v > max) throw new RangeError(`${what} out of range: ${v}`);
}

/**
 * Growable little-endian writer, the mirror image of {@link Cursor}.
 * Used to build documents for tests and fixtures.
 */
export class ByteWriter {
  private _b: Uint8Array;
  private _v: DataView;
  private _p = 0;

  constructor(initialSize = 256) {
    this._b = new Uint8Array(Math.max(1, initialSize));
    this._v = new DataView(this._b.buffer);
  }

  get length(): number { return this._p; }

  private _grow(n: number): void {
    if (this._p + n <= this._b.length) return;
    let c = this._b.length;
    while (c < this._p + n) c *= 2;
    const nb = new Uint8Array(c);
    nb.set(this._b);
    this._b = nb;
    this._v = new DataView(this._b.buffer);
  }

  writeU8(v: number): this { checkInt(v, 0, 0xff, "u8"); this._grow(1); this._b[this._p++] = v; return this; }
  writeI8(v: number): this { checkInt(v, -0x80, 0x7f, "i8"); this._grow(1); this._v.setInt8(this._p++, v); return this; }
  writeBool(v: boolean): this { return this.writeU8(v ? 1 : 0); }

  writeI16(v: number): this { checkInt(v, -0x8000, 0x7fff, "i16"); this._grow(2); this._v.setInt16(this._p, v, true); this._p += 2; return this; }
  writeU16(v: number): this { checkInt(v, 0, 0xffff, "u16"); this._grow(2); this._v.setUint16(this._p, v, true); this._p += 2; return this; }
  writeI32(v: number): this { checkInt(v, -0x80000000, 0x7fffffff, "i32"); this._grow(4); this._v.setInt32(this._p, v, true); this._p += 4; return this; }
  writeU32(v: number): this { checkInt(v, 0, 0xffffffff, "u32"); this._grow(4); this._v.setUint32(this._p, v, true); this._p += 4; return this; }

  writeI64(v: bigint): this {
    checkBig(v, -(1n << 63n), (1n << 63n) - 1n, "i64");
    this._grow(8); this._v.setBigInt64(this._p, v, true); this._p += 8;
    return this;
  }

  writeU64(v: bigint): this {
    checkBig(v, 0n, (1n << 64n) - 1n, "u64");
    this._grow(8); this._v.setBigUint64(this._p, v, true); this._p += 8;
    return this;
  }

  writeF32(v: number): this { this._grow(4); this._v.setFloat32(this._p, v, true); this._p += 4; return this; }
  writeF64(v: number): this { this._grow(8); this._v.setFloat64(this._p, v, true); this._p += 8; return this; }

  writeBytes(v: Uint8Array): this {
    this._grow(v.length);
    this._b.set(v, this._p);
    this._p += v.length;
    return this;
  }

  /** u16 byte length, then the UTF-8 bytes. */
  writeString(v: string): this {
    const enc = _te.encode(v);
    if (enc.length > MAX_STRING_BYTES) {
      throw new RangeError(`string of ${enc.length} bytes exceeds ${MAX_STRING_BYTES}`);
    }
    this.writeU16(enc.length);
    return this.writeBytes(enc);
  }

  finish(): Uint8Array {
    const r = this._b.slice(0, this._p);
    this._p = 0;
    return r;
  }
}
