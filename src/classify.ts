import { IntegerOverflowError, UnknownSerializerError } from "./errors";
import { isCodable } from "./registry";
import { BinarySubtype, ElementType, MaxUInt64, MinInt64, integerElementType } from "./types";
import { BsonCodable, Double, Int32, Int64, Key, LocalDateTime, ObjectId, UInt64, Uuid } from "./values";

/**
 * A plain object or a Map, encoded as an embedded document.
 */
export type DocumentSource = Record<string, unknown> | Map<unknown, unknown>;

/**
 * Substitutes a value the encoder cannot classify. The result is classified
 * again.
 */
export type UnknownValueHook = (value: unknown) => unknown;

/**
 * A host value resolved to exactly one element type.
 */
export type Element =
  | { type: ElementType.Double; value: number }
  | { type: ElementType.String; value: string }
  | { type: ElementType.Document; value: DocumentSource }
  | { type: ElementType.Document; value: BsonCodable; custom: true }
  | { type: ElementType.Array; value: readonly unknown[] }
  | { type: ElementType.Binary; value: Uint8Array; subtype: BinarySubtype }
  | { type: ElementType.ObjectId; value: Uint8Array }
  | { type: ElementType.Boolean; value: boolean }
  | { type: ElementType.DateTime; value: bigint; naive: boolean }
  | { type: ElementType.Null }
  | { type: ElementType.Int32; value: number }
  | { type: ElementType.Int64; value: bigint }
  | { type: ElementType.UInt64; value: bigint };

/**
 * Returns true for objects whose prototype is Object.prototype or null.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns true for values encoded as embedded documents.
 */
export function isDocumentSource(value: unknown): value is DocumentSource {
  return isPlainObject(value) || value instanceof Map;
}

/**
 * Renders an element name for error messages and object keys.
 */
export function keyToString(key: Key): string {
  return key instanceof Uint8Array ? String.fromCharCode(...key) : String(key);
}

/**
 * Resolves a value to its element, consulting the unknown-value hook for
 * anything outside the supported types.
 *
 * @throws UnknownSerializerError if the value is unsupported and no hook is set
 * @throws IntegerOverflowError if an integer exceeds every integer width
 */
export function classify(value: unknown, key: Key, onUnknown?: UnknownValueHook): Element {
  const element = classifyValue(value);
  if (element !== undefined) {
    return element;
  }
  if (onUnknown) {
    return classify(onUnknown(value), key, onUnknown);
  }
  throw new UnknownSerializerError(keyToString(key), value);
}

function classifyValue(value: unknown): Element | undefined {
  if (typeof value === "boolean") {
    return { type: ElementType.Boolean, value };
  }
  if (typeof value === "bigint") {
    return integerElement(value);
  }
  if (typeof value === "number") {
    if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
      return integerElement(BigInt(value));
    }
    return { type: ElementType.Double, value };
  }
  if (value instanceof Double) {
    return { type: ElementType.Double, value: value.value };
  }
  if (value instanceof Int32) {
    return { type: ElementType.Int32, value: value.value };
  }
  if (value instanceof Int64) {
    return { type: ElementType.Int64, value: value.value };
  }
  if (value instanceof UInt64) {
    return { type: ElementType.UInt64, value: value.value };
  }
  if (typeof value === "string") {
    return { type: ElementType.String, value };
  }
  if (value instanceof Uint8Array) {
    return { type: ElementType.Binary, value, subtype: BinarySubtype.Generic };
  }
  if (value instanceof Uuid) {
    return { type: ElementType.Binary, value: value.bytes, subtype: BinarySubtype.Uuid };
  }
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) {
      return undefined;
    }
    return { type: ElementType.DateTime, value: BigInt(ms), naive: false };
  }
  if (value instanceof LocalDateTime) {
    const ms = value.toEpochMilliseconds();
    if (!Number.isFinite(ms)) {
      return undefined;
    }
    return { type: ElementType.DateTime, value: BigInt(ms), naive: true };
  }
  if (value === null || value === undefined) {
    return { type: ElementType.Null };
  }
  if (isDocumentSource(value)) {
    return { type: ElementType.Document, value };
  }
  if (Array.isArray(value)) {
    return { type: ElementType.Array, value };
  }
  if (isCodable(value)) {
    return { type: ElementType.Document, value, custom: true };
  }
  if (value instanceof ObjectId) {
    return { type: ElementType.ObjectId, value: value.bytes };
  }
  return undefined;
}

function integerElement(value: bigint): Element {
  const type = integerElementType(value);
  switch (type) {
    case ElementType.Int32:
      return { type, value: Number(value) };
    case ElementType.Int64:
      return { type, value };
    case ElementType.UInt64:
      return { type, value };
    case undefined:
      throw new IntegerOverflowError(value, MinInt64, MaxUInt64);
  }
}
