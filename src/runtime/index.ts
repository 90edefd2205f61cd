export {
  Cursor,
  DEFAULT_MAX_DEPTH,
  BYTE_LEN,
  SHORT_LEN,
  INT_LEN,
  LONG_LEN,
  FLOAT_LEN,
  DOUBLE_LEN,
} from "./cursor.js";
export type { CursorOptions } from "./cursor.js";

export { ByteWriter } from "./writer.js";

export {
  optional,
  optionalArray,
  list,
  record,
  lengthPrefixedString,
  readCount,
} from "./combinators.js";
export type { Decoder } from "./combinators.js";

export * as s from "./schema.js";
export type { Slot, Infer, SlotDescriptor, FieldDescriptor, JsonValue, ScalarKind } from "./schema.js";

export {
  defineDocument,
  readDocument,
  decodeDocument,
  parseDocument,
  encodeDocument,
} from "./document.js";
export type { DocumentSchema, DocumentOptions, DecodeOptions, DecodedDocument } from "./document.js";

export {
  fromDescriptor,
  documentFromDescriptor,
  describeSchema,
  describeDocument,
} from "./descriptor.js";
export type { DocumentDescriptor } from "./descriptor.js";

export { toBitArray } from "./bits.js";

export {
  DecodeError,
  BoundsError,
  EncodingError,
  DepthLimitError,
  TrailingBytesError,
  SchemaError,
} from "./errors.js";
