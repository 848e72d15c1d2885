/**
 * tagwire-bson - a compact BSON codec for TypeScript
 *
 * Encodes plain objects, arrays and a small set of scalar types to the BSON
 * wire format and back. Application classes round-trip through a registry.
 *
 * @example
 * ```typescript
 * import { encode, decode } from 'tagwire-bson';
 *
 * const data = encode({ key: true, count: 3 });
 * const doc = decode(data); // { key: true, count: 3 }
 * ```
 */

// Core types
export {
  ElementType,
  BinarySubtype,
  CLASS_NAME_KEY,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
  MaxUInt64,
  isElementType,
  integerElementType,
} from "./types";

// Values
export {
  Double,
  Int32,
  Int64,
  UInt64,
  Uuid,
  ObjectId,
  LocalDateTime,
} from "./values";
export type {
  Key,
  BsonCodable,
  BsonScalar,
  BsonDocument,
  BsonMap,
  BsonArray,
  BsonValue,
  DecodedDocument,
  DecodedMap,
  DecodedValue,
} from "./values";

// Errors
export {
  BsonError,
  EncodeError,
  DecodeError,
  InvalidNameError,
  InvalidStringError,
  UnknownSerializerError,
  IntegerOverflowError,
  MalformedDocumentError,
  BufferUnderflowError,
  UnknownElementTypeError,
  InvalidUtf8Error,
  MissingClassDefinitionError,
  DocumentSizeExceededError,
  MissingTimezoneWarning,
} from "./errors";

// Writer
import { Writer } from "./writer";
export { Writer };

// Reader
import { Reader } from "./reader";
export { Reader };

// Registry
export {
  Registry,
  defaultRegistry,
  register,
  registerClass,
  registerAll,
  isCodable,
  isCodableClass,
  classTypeName,
  typeNameOf,
} from "./registry";
export type { Builder, CodableClass } from "./registry";

// Encoding and decoding
export { classify, isPlainObject, isDocumentSource } from "./classify";
export type { Element, UnknownValueHook, DocumentSource } from "./classify";
export { Encoder, encode } from "./encoder";
export type { EncodeOptions, TraversalHook, TraversalStep, WarningHandler } from "./encoder";
export { Decoder, decode, decodeDocumentAt } from "./decoder";
export type { DecodeOptions, DecodeResult } from "./decoder";

// Document sequences
export {
  SequenceWriter,
  SequenceReader,
  encodeSequence,
  decodeSequence,
} from "./sequence";
export type { SequenceReaderOptions } from "./sequence";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
