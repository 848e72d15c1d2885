import { BufferUnderflowError, InvalidUtf8Error, MalformedDocumentError } from "./errors";
import { LENGTH_SIZE } from "./types";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Reader decodes BSON primitives from a binary buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array, offset: number = 0) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = offset;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (needed < 0 || this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Returns the byte at an absolute offset without moving the cursor.
   */
  peekByteAt(offset: number): number {
    if (offset < 0 || offset >= this.end) {
      throw new BufferUnderflowError(offset + 1 - this.pos, this.remaining);
    }
    return this.buffer[offset];
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a boolean.
   */
  readBool(): boolean {
    return this.readByte() !== 0;
  }

  /**
   * Reads a 32-bit signed integer.
   */
  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true); // Little-endian
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit signed integer as bigint.
   */
  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 64-bit unsigned integer as bigint.
   */
  readUint64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readDouble(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }

  /**
   * Reads a NUL-terminated name.
   *
   * Names that are not valid UTF-8 are returned as their raw bytes.
   */
  readCString(): string | Uint8Array {
    const terminator = this.buffer.indexOf(0, this.pos);
    if (terminator < 0 || terminator >= this.end) {
      throw new MalformedDocumentError(`Unterminated element name at offset ${this.pos}`);
    }
    const bytes = this.buffer.subarray(this.pos, terminator);
    this.pos = terminator + 1;
    try {
      return textDecoder.decode(bytes);
    } catch {
      return Uint8Array.from(bytes);
    }
  }

  /**
   * Reads an int32 length-prefixed, NUL-terminated UTF-8 string.
   * @throws InvalidUtf8Error if the payload is not valid UTF-8
   */
  readString(): string {
    const start = this.pos;
    const length = this.readInt32();
    if (length < 1) {
      throw new MalformedDocumentError(`Invalid string length ${length} at offset ${start}`);
    }
    const bytes = this.readBytes(length);
    if (bytes[length - 1] !== 0) {
      throw new MalformedDocumentError(`Missing string terminator at offset ${start}`);
    }
    try {
      return textDecoder.decode(bytes.subarray(0, length - 1));
    } catch (err) {
      if (err instanceof TypeError) {
        throw new InvalidUtf8Error(start + LENGTH_SIZE);
      }
      throw err;
    }
  }

  /**
   * Reads a binary payload: int32 length, subtype byte, bytes.
   */
  readBinary(): { subtype: number; data: Uint8Array } {
    const start = this.pos;
    const length = this.readInt32();
    if (length < 0) {
      throw new MalformedDocumentError(`Invalid binary length ${length} at offset ${start}`);
    }
    const subtype = this.readByte();
    return { subtype, data: Uint8Array.from(this.readBytes(length)) };
  }

  /**
   * Moves the cursor to an absolute offset.
   */
  seek(offset: number): void {
    if (offset < 0 || offset > this.end) {
      throw new BufferUnderflowError(offset - this.pos, this.remaining);
    }
    this.pos = offset;
  }
}
