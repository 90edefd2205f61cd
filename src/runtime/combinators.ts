import type { Cursor } from "./cursor.js";
import { BoundsError } from "./errors.js";

export type Decoder<T> = (cursor: Cursor) => T;

// --- Presence gates ---

/** Gate byte, then `inner` if set; otherwise `fallback()` (null by default) and nothing more is read. */
export function optional<T>(inner: Decoder<T>): Decoder<T | null>;
export function optional<T, F>(inner: Decoder<T>, fallback: () => F): Decoder<T | F>;
export function optional<T, F>(inner: Decoder<T>, fallback?: () => F): Decoder<T | F | null> {
  return (cursor) => {
    if (cursor.readBool()) return inner(cursor);
    return fallback ? fallback() : null;
  };
}

/**
 * Reads an i32 element count. Negative counts yield zero elements. A count
 * that cannot fit in what is left of the buffer fails before any element is
 * decoded. Every element is taken to occupy at least one byte, so zero-width
 * elements cannot be repeated past the input's length.
 */
export function readCount(cursor: Cursor, minElementSize = 0): number {
  const count = cursor.readI32();
  if (count <= 0) return 0;
  const needed = count * Math.max(1, minElementSize);
  if (needed > cursor.remaining) {
    throw new BoundsError(cursor.position, needed, cursor.remaining);
  }
  return count;
}

/** i32 count followed by that many elements, no gate. */
export function list<T>(element: Decoder<T>, minElementSize = 0): Decoder<T[]> {
  return (cursor) => {
    const n = readCount(cursor, minElementSize);
    const out: T[] = [];
    for (let i = 0; i < n; i++) out.push(element(cursor));
    return out;
  };
}

/** Gate byte, then (if set) a {@link list}; an unset gate is an empty array. */
export function optionalArray<T>(element: Decoder<T>, minElementSize = 0): Decoder<T[]> {
  const body = list(element, minElementSize);
  return (cursor) => (cursor.readBool() ? body(cursor) : []);
}

export const lengthPrefixedString: Decoder<string> = (cursor) =>
  cursor.readUtf8(cursor.readU16());

/** One level of record nesting, counted against the cursor's depth ceiling. */
export function record<T>(build: Decoder<T>): Decoder<T> {
  return (cursor) => cursor.descend(() => build(cursor));
}
