import { Cursor } from "./cursor.js";
import { TrailingBytesError } from "./errors.js";
import type { Slot } from "./schema.js";
import { ByteWriter } from "./writer.js";

export interface DocumentSchema<T> {
  readonly name: string;
  readonly root: Slot<T>;
  /** Default source file name. */
  readonly source: string;
  /** Default output file name. */
  readonly output: string;
  /** Value of a document whose root gate is unset. */
  empty(): T;
}

export interface DocumentOptions<T> {
  source?: string;
  output?: string;
  empty?: () => T;
}

export function defineDocument<T>(
  name: string,
  root: Slot<T>,
  options: DocumentOptions<T> = {},
): DocumentSchema<T> {
  return {
    name,
    root,
    source: options.source ?? `${name}.bytes`,
    output: options.output ?? `${name}.json`,
    empty: options.empty ?? (() => root.empty()),
  };
}

export interface DecodeOptions {
  maxDepth?: number;
  /** Fail when bytes remain after the root record. */
  exact?: boolean;
}

export interface DecodedDocument<T> {
  value: T;
  /** Whether the root gate was set. */
  present: boolean;
  bytesRead: number;
  /** Bytes left unread after the root record. */
  trailing: number;
}

/** Reads the root gate and, if set, the root record, from the cursor's position. */
export function readDocument<T>(doc: DocumentSchema<T>, cursor: Cursor): { value: T; present: boolean } {
  if (!cursor.readBool()) return { value: doc.empty(), present: false };
  return { value: doc.root.decode(cursor), present: true };
}

export function decodeDocument<T>(
  doc: DocumentSchema<T>,
  data: Uint8Array,
  options: DecodeOptions = {},
): DecodedDocument<T> {
  const cursor = new Cursor(data, { maxDepth: options.maxDepth });
  const { value, present } = readDocument(doc, cursor);
  if (options.exact && !cursor.eof) {
    throw new TrailingBytesError(cursor.position, cursor.remaining);
  }
  return { value, present, bytesRead: cursor.position, trailing: cursor.remaining };
}

export function parseDocument<T>(doc: DocumentSchema<T>, data: Uint8Array, options?: DecodeOptions): T {
  return decodeDocument(doc, data, options).value;
}

/** Root gate set, then `value`; with no value, a lone unset gate. */
export function encodeDocument<T>(doc: DocumentSchema<T>, value?: T): Uint8Array {
  const w = new ByteWriter();
  if (value === undefined) {
    w.writeBool(false);
  } else {
    w.writeBool(true);
    doc.root.encode(w, value);
  }
  return w.finish();
}
