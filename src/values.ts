import { parse as parseUuid, validate as validateUuid, v4 as uuidv4 } from "uuid";
import { IntegerOverflowError } from "./errors";
import { MaxInt64, MaxUInt64, MinInt64, OBJECT_ID_SIZE, UUID_SIZE } from "./types";

/**
 * Element name as accepted by the encoder. Numbers are written in decimal,
 * byte arrays verbatim.
 */
export type Key = string | number | Uint8Array;

/**
 * Signed 32-bit integer written with tag 0x10 regardless of magnitude.
 */
export class Int32 {
  readonly value: number;

  constructor(value: number) {
    if (!Number.isInteger(value)) {
      throw new RangeError(`Int32 requires an integer, got ${value}`);
    }
    if (value < -0x80000000 || value > 0x7fffffff) {
      throw new IntegerOverflowError(BigInt(value), -0x80000000n, 0x7fffffffn);
    }
    this.value = value;
  }
}

/**
 * Signed 64-bit integer written with tag 0x12 regardless of magnitude.
 */
export class Int64 {
  readonly value: bigint;

  constructor(value: bigint | number) {
    const v = BigInt(value);
    if (v < MinInt64 || v > MaxInt64) {
      throw new IntegerOverflowError(v, MinInt64, MaxInt64);
    }
    this.value = v;
  }
}

/**
 * Unsigned 64-bit integer written with tag 0x11 regardless of magnitude.
 */
export class UInt64 {
  readonly value: bigint;

  constructor(value: bigint | number) {
    const v = BigInt(value);
    if (v < 0n || v > MaxUInt64) {
      throw new IntegerOverflowError(v, 0n, MaxUInt64);
    }
    this.value = v;
  }
}

/**
 * 64-bit float written with tag 0x01 even when it holds a whole number.
 *
 * The decoder returns whole-number doubles in this wrapper so that they
 * re-encode as doubles rather than integers.
 */
export class Double {
  readonly value: number;

  constructor(value: number) {
    this.value = value;
  }

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return String(this.value);
  }
}

/**
 * 128-bit unique identifier, stored as binary subtype 4.
 */
export class Uuid {
  readonly bytes: Uint8Array;

  constructor(input: string | Uint8Array) {
    if (typeof input === "string") {
      if (!validateUuid(input)) {
        throw new TypeError(`Invalid UUID: ${input}`);
      }
      this.bytes = Uint8Array.from(parseUuid(input));
    } else {
      if (input.length !== UUID_SIZE) {
        throw new TypeError(`UUID requires ${UUID_SIZE} bytes, got ${input.length}`);
      }
      this.bytes = Uint8Array.from(input);
    }
  }

  /**
   * Creates a random (version 4) UUID.
   */
  static random(): Uuid {
    return new Uuid(uuidv4());
  }

  // uuid's stringify throws unless the version and variant bits are RFC 9562
  toString(): string {
    const hex = toHex(this.bytes);
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }

  equals(other: Uuid): boolean {
    return this.toString() === other.toString();
  }
}

/**
 * 12-byte object identifier. Decoding surfaces object ids as hex strings, so
 * this wrapper only exists on the encode side.
 */
export class ObjectId {
  readonly bytes: Uint8Array;

  constructor(input: string | Uint8Array) {
    if (typeof input === "string") {
      if (!/^[0-9a-fA-F]{24}$/.test(input)) {
        throw new TypeError(`ObjectId requires 24 hex characters, got ${JSON.stringify(input)}`);
      }
      this.bytes = fromHex(input);
    } else {
      if (input.length !== OBJECT_ID_SIZE) {
        throw new TypeError(`ObjectId requires ${OBJECT_ID_SIZE} bytes, got ${input.length}`);
      }
      this.bytes = Uint8Array.from(input);
    }
  }

  toHexString(): string {
    return toHex(this.bytes);
  }

  toString(): string {
    return this.toHexString();
  }
}

/**
 * Wall-clock date and time without a timezone.
 *
 * Encoding assumes UTC and reports a MissingTimezoneWarning. Sub-millisecond
 * precision is rounded to the nearest millisecond.
 */
export class LocalDateTime {
  constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
    readonly hour: number = 0,
    readonly minute: number = 0,
    readonly second: number = 0,
    readonly microsecond: number = 0
  ) {}

  /**
   * Milliseconds since the Unix epoch, reading the fields as UTC.
   */
  toEpochMilliseconds(): number {
    // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
    const date = new Date(0);
    date.setUTCFullYear(this.year, this.month - 1, this.day);
    date.setUTCHours(this.hour, this.minute, this.second, 0);
    return date.getTime() + Math.round(this.microsecond / 1000);
  }
}

/**
 * An application type that round-trips through a registry.
 *
 * `bsonEncode` returns the plain document form of the instance. The type
 * identifier is the constructor's static `bsonTypeName`, or its class name.
 */
export interface BsonCodable {
  bsonEncode(): BsonDocument | BsonMap;
}

export type BsonScalar =
  | number
  | bigint
  | boolean
  | string
  | null
  | undefined
  | Uint8Array
  | Date
  | Double
  | Int32
  | Int64
  | UInt64
  | Uuid
  | ObjectId
  | LocalDateTime;

export interface BsonDocument {
  [key: string]: BsonValue;
}

export type BsonMap = Map<Key, BsonValue>;

export type BsonArray = readonly BsonValue[];

/**
 * Values the encoder classifies without an unknown-value hook.
 */
export type BsonValue = BsonScalar | BsonDocument | BsonMap | BsonArray | BsonCodable;

export interface DecodedDocument {
  [key: string]: DecodedValue;
}

export type DecodedMap = Map<string | Uint8Array, DecodedValue>;

/**
 * Values produced by the decoder. Custom objects are whatever their registered
 * builder returns.
 */
export type DecodedValue =
  | number
  | Double
  | bigint
  | boolean
  | string
  | null
  | Uint8Array
  | Uuid
  | Date
  | DecodedDocument
  | DecodedMap
  | DecodedValue[]
  | object;

export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b.toString(16).padStart(2, "0");
  }
  return out;
}

function fromHex(hex: string): Uint8Array {
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
