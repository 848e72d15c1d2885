/**
 * Element type tags of the BSON wire format.
 *
 * Only the tags listed here are encodable or decodable. Regex, JavaScript
 * code, the deprecated Undefined/DBPointer/Symbol types and the MongoDB
 * internal timestamp are intentionally absent.
 */
export enum ElementType {
  /** 8-byte IEEE 754 double (little-endian) */
  Double = 0x01,
  /** int32 length + UTF-8 bytes + NUL */
  String = 0x02,
  /** Embedded document */
  Document = 0x03,
  /** Embedded document with index names */
  Array = 0x04,
  /** int32 length + subtype byte + bytes */
  Binary = 0x05,
  /** 12 raw bytes */
  ObjectId = 0x07,
  /** 1 byte, 0 or 1 */
  Boolean = 0x08,
  /** int64 milliseconds since the Unix epoch (UTC) */
  DateTime = 0x09,
  /** No payload */
  Null = 0x0a,
  /** Signed 32-bit integer */
  Int32 = 0x10,
  /** Unsigned 64-bit integer */
  UInt64 = 0x11,
  /** Signed 64-bit integer */
  Int64 = 0x12,
}

/**
 * Binary subtypes understood by the codec.
 */
export enum BinarySubtype {
  Generic = 0x00,
  UuidLegacy = 0x03,
  Uuid = 0x04,
}

/**
 * Reserved element name carrying the type identifier of a custom object.
 */
export const CLASS_NAME_KEY = "$$__CLASS_NAME__$$";

/**
 * Integer bounds.
 */
export const MinInt32 = -0x80000000n; // -2^31
export const MaxInt32 = 0x7fffffffn; // 2^31 - 1
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUInt64 = BigInt("0xffffffffffffffff"); // 2^64 - 1

/**
 * Size in bytes of a length prefix and of a document terminator.
 */
export const LENGTH_SIZE = 4;
export const TERMINATOR_SIZE = 1;

/**
 * Byte length of an object id payload.
 */
export const OBJECT_ID_SIZE = 12;

/**
 * Byte length of a UUID payload.
 */
export const UUID_SIZE = 16;

/**
 * Returns true if the byte is one of the known element tags.
 */
export function isElementType(tag: number): tag is ElementType {
  return ElementType[tag] !== undefined;
}

/**
 * Picks the narrowest integer tag for a value.
 *
 * Values from 2^63 - 1 up to 2^64 - 1 inclusive select uint64; the signed
 * 64-bit maximum itself is written as unsigned.
 *
 * @returns undefined when the value does not fit any integer tag
 */
export function integerElementType(
  value: bigint
): ElementType.Int32 | ElementType.Int64 | ElementType.UInt64 | undefined {
  if (value < MinInt64 || value > MaxUInt64) {
    return undefined;
  }
  if (value >= MinInt32 && value <= MaxInt32) {
    return ElementType.Int32;
  }
  if (value >= MaxInt64) {
    return ElementType.UInt64;
  }
  return ElementType.Int64;
}
