import type { Cursor } from "./cursor.js";
import { list as listOf, optionalArray } from "./combinators.js";
import { SchemaError } from "./errors.js";
import type { ByteWriter } from "./writer.js";

// === Schema descriptors ===
//
// A schema is an ordered tree of slots. Field identity in the byte stream is
// purely positional, so a record's field list *is* its wire layout.

export const SCALAR_KINDS = [
  "u8", "i8", "bool", "u16", "i16", "u32", "i32", "u64", "i64", "f32", "f64", "string",
] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

export type SlotKind = ScalarKind | "record" | "array" | "list" | "optional" | "map" | "lazy";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Serializable form of a slot, as written in descriptor files. */
export type SlotDescriptor =
  | ScalarKind
  | { kind: "record"; fields: FieldDescriptor[] }
  | { kind: "array" | "list"; of: SlotDescriptor }
  | { kind: "optional"; of: SlotDescriptor; default?: JsonValue }
  | { ref: string };

export interface FieldDescriptor {
  name: string;
  type: SlotDescriptor;
}

export interface Slot<T> {
  readonly kind: SlotKind;
  /** Fewest bytes a value of this slot can occupy. */
  readonly minSize: number;
  decode(cursor: Cursor): T;
  /** Writes `value`, checking its shape at run time. */
  encode(writer: ByteWriter, value: unknown): void;
  /** Canonical value for an absent slot. */
  empty(): T;
  /** `definitions` collects the named slots reached through {@link lazy}. */
  describe(definitions: Map<string, SlotDescriptor>): SlotDescriptor;
}

export type Infer<S> = S extends Slot<infer T> ? T : never;

// --- Scalars ---

function scalar<T>(
  kind: ScalarKind,
  size: number,
  zero: T,
  is: (v: unknown) => v is T,
  read: (c: Cursor) => T,
  write: (w: ByteWriter, v: T) => void,
): Slot<T> {
  return {
    kind,
    minSize: size,
    decode: read,
    encode(writer, value) {
      if (!is(value)) throw new TypeError(`expected ${kind}, got ${typeof value}`);
      write(writer, value);
    },
    empty: () => zero,
    describe: () => kind,
  };
}

const isNumber = (v: unknown): v is number => typeof v === "number";
const isBigInt = (v: unknown): v is bigint => typeof v === "bigint";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isString = (v: unknown): v is string => typeof v === "string";

export const u8 = scalar("u8", 1, 0, isNumber, (c) => c.readU8(), (w, v) => { w.writeU8(v); });
export const i8 = scalar("i8", 1, 0, isNumber, (c) => c.readI8(), (w, v) => { w.writeI8(v); });
export const bool = scalar("bool", 1, false, isBoolean, (c) => c.readBool(), (w, v) => { w.writeBool(v); });
export const u16 = scalar("u16", 2, 0, isNumber, (c) => c.readU16(), (w, v) => { w.writeU16(v); });
export const i16 = scalar("i16", 2, 0, isNumber, (c) => c.readI16(), (w, v) => { w.writeI16(v); });
export const u32 = scalar("u32", 4, 0, isNumber, (c) => c.readU32(), (w, v) => { w.writeU32(v); });
export const i32 = scalar("i32", 4, 0, isNumber, (c) => c.readI32(), (w, v) => { w.writeI32(v); });
export const u64 = scalar("u64", 8, 0n, isBigInt, (c) => c.readU64(), (w, v) => { w.writeU64(v); });
export const i64 = scalar("i64", 8, 0n, isBigInt, (c) => c.readI64(), (w, v) => { w.writeI64(v); });
export const f32 = scalar("f32", 4, 0, isNumber, (c) => c.readF32(), (w, v) => { w.writeF32(v); });
export const f64 = scalar("f64", 8, 0, isNumber, (c) => c.readF64(), (w, v) => { w.writeF64(v); });

/** u16 byte length, then UTF-8. */
export const str = scalar("string", 2, "", isString, (c) => c.readUtf8(c.readU16()), (w, v) => { w.writeString(v); });

export const scalars: { readonly [K in ScalarKind]: Slot<unknown> } = {
  u8, i8, bool, u16, i16, u32, i32, u64, i64, f32, f64, string: str,
};

// --- Records ---

export interface Field<N extends string, T> {
  readonly name: N;
  readonly slot: Slot<T>;
}

export type AnyField = Field<string, unknown>;

export type RecordValue<F extends readonly AnyField[]> = {
  [E in F[number] as E["name"]]: E extends Field<string, infer T> ? T : never;
};

export function field<N extends string, T>(name: N, slot: Slot<T>): Field<N, T> {
  return { name, slot };
}

export function record<F extends readonly AnyField[]>(...fields: F): Slot<RecordValue<F>> {
  const seen = new Set<string>();
  for (const f of fields) {
    if (f.name === "") throw new SchemaError("record field without a name");
    if (seen.has(f.name)) throw new SchemaError(`duplicate record field "${f.name}"`);
    seen.add(f.name);
  }

  // Property order follows `fields`, which is also the read order.
  const build = (valueOf: (f: AnyField) => unknown): RecordValue<F> => {
    const out: Record<string, unknown> = {};
    for (const f of fields) out[f.name] = valueOf(f);
    return out as RecordValue<F>;
  };

  return {
    kind: "record",
    minSize: fields.reduce((n, f) => n + f.slot.minSize, 0),
    decode(cursor) {
      return cursor.descend(() => build((f) => f.slot.decode(cursor)));
    },
    encode(writer, value) {
      if (typeof value !== "object" || value === null || Array.isArray(value)) {
        throw new TypeError(`expected record, got ${value === null ? "null" : typeof value}`);
      }
      const values = new Map<string, unknown>(Object.entries(value));
      for (const f of fields) {
        if (!values.has(f.name)) throw new TypeError(`record is missing field "${f.name}"`);
        f.slot.encode(writer, values.get(f.name));
      }
    },
    empty: () => build((f) => f.slot.empty()),
    describe: (definitions) => ({
      kind: "record",
      fields: fields.map((f) => ({ name: f.name, type: f.slot.describe(definitions) })),
    }),
  };
}

// --- Collections ---

function encodeElements<T>(writer: ByteWriter, of: Slot<T>, value: unknown): void {
  if (!Array.isArray(value)) throw new TypeError(`expected array, got ${typeof value}`);
  writer.writeI32(value.length);
  for (const el of value) of.encode(writer, el);
}

/** Presence gate, then an i32 count and the elements. An unset gate is `[]`. */
export function array<T>(of: Slot<T>): Slot<T[]> {
  const decode = optionalArray((c) => of.decode(c), of.minSize);
  return {
    kind: "array",
    minSize: 1,
    decode,
    encode(writer, value) {
      writer.writeBool(true);
      encodeElements(writer, of, value);
    },
    empty: () => [],
    describe: (definitions) => ({ kind: "array", of: of.describe(definitions) }),
  };
}

/** i32 count and the elements, without a presence gate. */
export function list<T>(of: Slot<T>): Slot<T[]> {
  const decode = listOf((c) => of.decode(c), of.minSize);
  return {
    kind: "list",
    minSize: 4,
    decode,
    encode(writer, value) {
      encodeElements(writer, of, value);
    },
    empty: () => [],
    describe: (definitions) => ({ kind: "list", of: of.describe(definitions) }),
  };
}

// --- Optionals ---

/**
 * Presence gate around `of`. An unset gate resolves to `fallback()`, or null.
 * `null` and `undefined` encode as an unset gate; anything else is written in full.
 */
export function optional<T>(of: Slot<T>): Slot<T | null>;
export function optional<T, F>(of: Slot<T>, fallback: () => F): Slot<T | F>;
export function optional<T, F>(of: Slot<T>, fallback?: () => F): Slot<T | F | null> {
  const empty = (): T | F | null => (fallback ? fallback() : null);
  return {
    kind: "optional",
    minSize: 1,
    decode: (cursor) => (cursor.readBool() ? of.decode(cursor) : empty()),
    encode(writer, value) {
      if (value === null || value === undefined) {
        writer.writeBool(false);
        return;
      }
      writer.writeBool(true);
      of.encode(writer, value);
    },
    empty,
    describe(definitions) {
      const inner = of.describe(definitions);
      const d = empty();
      return isJsonValue(d) && d !== null
        ? { kind: "optional", of: inner, default: d }
        : { kind: "optional", of: inner };
    },
  };
}

// --- Transforms and references ---

/**
 * Applies `fn` to every decoded value. Encoding writes the value through `of`
 * unchanged, so `fn` should keep the value's shape (rounding, clamping).
 */
export function map<T, U>(of: Slot<T>, fn: (value: T) => U): Slot<U> {
  return {
    kind: "map",
    minSize: of.minSize,
    decode: (cursor) => fn(of.decode(cursor)),
    encode: (writer, value) => of.encode(writer, value),
    empty: () => fn(of.empty()),
    describe: (definitions) => of.describe(definitions),
  };
}

/**
 * Named forward reference, for schemas that contain themselves. Each
 * resolution enters one nesting level on the cursor.
 */
export function lazy<T>(name: string, resolve: () => Slot<T>): Slot<T> {
  let resolvingEmpty = false;
  return {
    kind: "lazy",
    minSize: 0,
    decode: (cursor) => cursor.descend(() => resolve().decode(cursor)),
    encode: (writer, value) => resolve().encode(writer, value),
    empty() {
      if (resolvingEmpty) throw new SchemaError(`"${name}" has no finite empty value`);
      resolvingEmpty = true;
      try {
        return resolve().empty();
      } finally {
        resolvingEmpty = false;
      }
    },
    describe(definitions) {
      if (!definitions.has(name)) {
        definitions.set(name, { ref: name });
        definitions.set(name, resolve().describe(definitions));
      }
      return { ref: name };
    },
  };
}

export function isJsonValue(v: unknown): v is JsonValue {
  if (v === null || typeof v === "string" || typeof v === "boolean") return true;
  if (typeof v === "number") return Number.isFinite(v);
  if (Array.isArray(v)) return v.every(isJsonValue);
  if (typeof v === "object") return Object.values(v).every(isJsonValue);
  return false;
}
