import { describe, expect, test } from "vitest";
import {
  BoundsError,
  ByteWriter,
  Cursor,
  DepthLimitError,
  EncodingError,
} from "../src/runtime/index.js";

const bytes = (...b: number[]) => Uint8Array.from(b);

describe("fixed-width reads", () => {
  test("integers are little-endian", () => {
    const c = new Cursor(bytes(0x01, 0x02, 0x78, 0x56, 0x34, 0x12));
    expect(c.readU16()).toBe(0x0201);
    expect(c.readU32()).toBe(0x12345678);
    expect(c.position).toBe(6);
    expect(c.eof).toBe(true);
  });

  test("i8 reinterprets the high bit as sign", () => {
    const c = new Cursor(bytes(0x7f, 0x80, 0xff, 0x00));
    expect([c.readI8(), c.readI8(), c.readI8(), c.readI8()]).toEqual([127, -128, -1, 0]);
  });

  test("bool is true for any nonzero byte", () => {
    const c = new Cursor(bytes(0x00, 0x01, 0x02, 0xff));
    expect([c.readBool(), c.readBool(), c.readBool(), c.readBool()]).toEqual([false, true, true, true]);
  });

  test("signed and unsigned views of the same bytes", () => {
    const data = bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff);
    expect(new Cursor(data).readI16()).toBe(-1);
    expect(new Cursor(data).readU16()).toBe(65535);
    expect(new Cursor(data).readI32()).toBe(-1);
    expect(new Cursor(data).readU32()).toBe(4294967295);
    expect(new Cursor(data).readI64()).toBe(-1n);
    expect(new Cursor(data).readU64()).toBe(18446744073709551615n);
  });

  test("integer boundaries", () => {
    const w = new ByteWriter()
      .writeI16(-32768)
      .writeI32(-2147483648)
      .writeI32(2147483647)
      .writeI64(-9223372036854775808n)
      .writeU64(18446744073709551615n);
    const c = new Cursor(w.finish());
    expect(c.readI16()).toBe(-32768);
    expect(c.readI32()).toBe(-2147483648);
    expect(c.readI32()).toBe(2147483647);
    expect(c.readI64()).toBe(-9223372036854775808n);
    expect(c.readU64()).toBe(18446744073709551615n);
    expect(c.remaining).toBe(0);
  });

  test("floats", () => {
    const w = new ByteWriter().writeF32(0.5).writeF32(NaN).writeF64(-Infinity).writeF64(0.1);
    const c = new Cursor(w.finish());
    expect(c.readF32()).toBe(0.5);
    expect(c.readF32()).toBeNaN();
    expect(c.readF64()).toBe(-Infinity);
    expect(c.readF64()).toBe(0.1);
    expect(c.position).toBe(24);
  });

  test("reads from a subarray honour its offset", () => {
    const backing = bytes(0xaa, 0xbb, 0x05, 0x00, 0x00, 0x00);
    const c = new Cursor(backing.subarray(2));
    expect(c.length).toBe(4);
    expect(c.readI32()).toBe(5);
  });
});

describe("strings", () => {
  test("length-prefixed multi-byte text", () => {
    const data = new ByteWriter().writeString("赛尔号").finish();
    expect(data.length).toBe(2 + 9);
    const c = new Cursor(data);
    expect(c.readUtf8(c.readU16())).toBe("赛尔号");
    expect(c.position).toBe(11);
  });

  test("invalid UTF-8 is an encoding error", () => {
    const c = new Cursor(bytes(0x41, 0xff, 0xfe));
    expect(() => c.readUtf8(3)).toThrow(EncodingError);
  });

  test("a leading byte-order mark is kept", () => {
    const c = new Cursor(bytes(0xef, 0xbb, 0xbf, 0x41));
    expect(c.readUtf8(4)).toBe("\uFEFFA");
  });

  test("zero-length string", () => {
    const c = new Cursor(bytes(0x00, 0x00));
    expect(c.readUtf8(c.readU16())).toBe("");
    expect(c.eof).toBe(true);
  });
});

describe("bounds", () => {
  test("a truncated i32 fails and reports the span", () => {
    const c = new Cursor(bytes(0x01, 0x02));
    let caught: unknown;
    try {
      c.readI32();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BoundsError);
    expect(caught).toMatchObject({ offset: 0, requested: 4, available: 2, name: "BoundsError" });
  });

  test("string longer than the rest of the buffer", () => {
    const c = new Cursor(bytes(0x05, 0x00, 0x61, 0x62));
    const len = c.readU16();
    expect(() => c.readUtf8(len)).toThrow(BoundsError);
  });

  test("empty buffer", () => {
    expect(() => new Cursor(new Uint8Array(0)).readBool()).toThrow(BoundsError);
  });

  test("seek and skip stay inside the buffer", () => {
    const c = new Cursor(bytes(1, 2, 3, 4));
    c.seek(4);
    expect(c.eof).toBe(true);
    expect(() => c.seek(5)).toThrow(RangeError);
    c.seek(1);
    c.skip(2);
    expect(c.readU8()).toBe(4);
    expect(() => c.skip(1)).toThrow(BoundsError);
  });

  test("readBytes copies the span", () => {
    const data = bytes(9, 8, 7);
    const c = new Cursor(data, { position: 1 });
    const out = c.readBytes(2);
    out[0] = 0;
    expect(Array.from(data)).toEqual([9, 8, 7]);
    expect(c.eof).toBe(true);
  });
});

describe("nesting depth", () => {
  test("descend fails past the ceiling and unwinds on success", () => {
    const c = new Cursor(new Uint8Array(0), { maxDepth: 2 });
    expect(c.descend(() => c.descend(() => c.depth))).toBe(2);
    expect(c.depth).toBe(0);
    expect(() => c.descend(() => c.descend(() => c.descend(() => 0)))).toThrow(DepthLimitError);
  });
});
