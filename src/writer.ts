import { InvalidNameError, InvalidStringError } from "./errors";
import { BinarySubtype, ElementType, LENGTH_SIZE } from "./types";
import { Key } from "./values";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

// Matches only unpaired surrogates under the u flag
const LONE_SURROGATE = /\p{Surrogate}/u;

function encodeUtf8(value: string): Uint8Array {
  if (LONE_SURROGATE.test(value)) {
    throw new InvalidStringError(value);
  }
  return textEncoder.encode(value);
}

/**
 * Writer encodes BSON primitives into a growable little-endian buffer.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer);
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean as a single 0/1 byte.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a 32-bit signed integer.
   */
  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true); // Little-endian
    this.pos += 4;
  }

  /**
   * Writes a 64-bit signed integer.
   */
  writeInt64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }

  /**
   * Writes a 64-bit unsigned integer.
   */
  writeUint64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeDouble(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }

  /**
   * Writes a NUL-terminated element name.
   * @throws InvalidNameError if the name already contains a NUL byte
   * @throws InvalidStringError if the name holds a lone surrogate
   */
  writeCString(name: Key): void {
    const bytes = name instanceof Uint8Array ? name : encodeUtf8(String(name));
    if (bytes.includes(0)) {
      throw new InvalidNameError(name instanceof Uint8Array ? String.fromCharCode(...name) : String(name));
    }
    this.writeBytes(bytes);
    this.writeByte(0);
  }

  /**
   * Writes a string as int32(byte length + 1), the UTF-8 bytes and a NUL.
   * @throws InvalidStringError if the string holds a lone surrogate
   */
  writeString(value: string): void {
    const bytes = encodeUtf8(value);
    this.writeInt32(bytes.length + 1);
    this.writeBytes(bytes);
    this.writeByte(0);
  }

  /**
   * Writes a binary payload: int32 length, subtype byte, bytes.
   */
  writeBinary(data: Uint8Array, subtype: BinarySubtype = BinarySubtype.Generic): void {
    this.writeInt32(data.length);
    this.writeByte(subtype);
    this.writeBytes(data);
  }

  /**
   * Writes an element header: the type tag followed by the name.
   */
  writeElementHeader(type: ElementType, name: Key): void {
    this.writeByte(type);
    this.writeCString(name);
  }

  /**
   * Reserves space for an int32 length prefix and returns its offset.
   */
  reserveLength(): number {
    const at = this.pos;
    this.ensureCapacity(LENGTH_SIZE);
    this.pos += LENGTH_SIZE;
    return at;
  }

  /**
   * Fills a reserved length prefix with the byte count from it to the
   * current position.
   */
  patchLength(at: number): void {
    this.view.setInt32(at, this.pos - at, true);
  }
}
