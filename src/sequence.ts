/**
 * Support for buffers holding several documents back to back, as found in
 * dump files.
 *
 * Wire format: [document][document]... where every document carries its own
 * int32 length prefix, so no extra framing is needed.
 */

import { Decoder, DecodeOptions } from "./decoder";
import { Encoder, EncodeOptions } from "./encoder";
import { DocumentSizeExceededError, MalformedDocumentError } from "./errors";
import { Reader } from "./reader";
import { LENGTH_SIZE } from "./types";
import { DecodedValue } from "./values";
import { Writer } from "./writer";

/** Default maximum document size (16 MB), matching the usual BSON limit. */
const DEFAULT_MAX_DOCUMENT_SIZE = 16 * 1024 * 1024;

/**
 * Options for SequenceReader configuration.
 */
export interface SequenceReaderOptions extends DecodeOptions {
  /** Maximum allowed document size in bytes. Default: 16 MB */
  maxDocumentSize?: number;
}

/**
 * SequenceWriter concatenates encoded documents into one buffer.
 *
 * @example
 * ```typescript
 * const out = new SequenceWriter();
 * out.writeDocument({ id: 1 });
 * out.writeDocument({ id: 2 });
 * const data = out.bytes();
 * ```
 */
export class SequenceWriter {
  private readonly writer = new Writer();
  private readonly encoder: Encoder;
  private count = 0;

  constructor(options: EncodeOptions = {}) {
    this.encoder = new Encoder(options);
  }

  /**
   * Returns the number of documents written.
   */
  get length(): number {
    return this.count;
  }

  /**
   * Encodes a document and appends it.
   */
  writeDocument(value: unknown): void {
    this.writer.writeBytes(this.encoder.encode(value));
    this.count++;
  }

  /**
   * Appends an already encoded document.
   * @throws MalformedDocumentError if the length prefix does not match the data
   */
  writeEncoded(data: Uint8Array): void {
    if (data.length < LENGTH_SIZE) {
      throw new MalformedDocumentError(`Encoded document of ${data.length} bytes has no length prefix`);
    }
    const length = new DataView(data.buffer, data.byteOffset, data.byteLength).getInt32(0, true);
    if (length !== data.length) {
      throw new MalformedDocumentError(`Length prefix ${length} does not match ${data.length} bytes`);
    }
    this.writer.writeBytes(data);
    this.count++;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.writer.reset();
    this.count = 0;
  }
}

/**
 * SequenceReader reads concatenated documents from a buffer.
 *
 * @example
 * ```typescript
 * const reader = new SequenceReader(data);
 * for (const doc of reader.documents()) {
 *   // use doc...
 * }
 * ```
 */
export class SequenceReader {
  private readonly data: Uint8Array;
  private readonly options: DecodeOptions;
  private maxDocumentSize: number;
  private pos: number;

  constructor(data: Uint8Array, options: SequenceReaderOptions = {}) {
    this.data = data;
    this.options = { registry: options.registry, useMaps: options.useMaps, plainDoubles: options.plainDoubles };
    this.maxDocumentSize = options.maxDocumentSize ?? DEFAULT_MAX_DOCUMENT_SIZE;
    this.pos = 0;
  }

  /**
   * Returns the offset of the next document.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.data.length - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.data.length;
  }

  /**
   * Sets the maximum allowed document size.
   */
  setMaxDocumentSize(size: number): void {
    if (size <= 0) {
      throw new RangeError("Max document size must be positive");
    }
    this.maxDocumentSize = size;
  }

  /**
   * Reads and decodes the next document.
   *
   * @throws MalformedDocumentError if no complete document follows
   * @throws DocumentSizeExceededError if the document exceeds the max size
   */
  readDocument(): DecodedValue {
    this.checkSize();
    const reader = new Reader(this.data, this.pos);
    const value = new Decoder(reader, this.options).readDocument(false);
    this.pos = reader.position;
    return value;
  }

  /**
   * Reads the next document, or returns null at the end of the buffer.
   */
  tryReadDocument(): DecodedValue | null {
    if (!this.hasMore) {
      return null;
    }
    return this.readDocument();
  }

  /**
   * Skips the next document without decoding it.
   *
   * @returns The number of bytes skipped
   */
  skipDocument(): number {
    const length = this.checkSize();
    if (length > this.remaining) {
      throw new MalformedDocumentError(
        `Document claims ${length} bytes but only ${this.remaining} available`
      );
    }
    this.pos += length;
    return length;
  }

  /**
   * Resets the reader to the beginning of the buffer.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Returns a synchronous iterator over all documents.
   */
  *documents(): IterableIterator<DecodedValue> {
    while (this.hasMore) {
      yield this.readDocument();
    }
  }

  private checkSize(): number {
    const length = new Reader(this.data, this.pos).readInt32();
    if (length < LENGTH_SIZE + 1) {
      throw new MalformedDocumentError(`Invalid document length ${length} at offset ${this.pos}`);
    }
    if (length > this.maxDocumentSize) {
      throw new DocumentSizeExceededError(length, this.maxDocumentSize);
    }
    return length;
  }
}

/**
 * Encodes several documents into one buffer.
 */
export function encodeSequence(values: Iterable<unknown>, options: EncodeOptions = {}): Uint8Array {
  const out = new SequenceWriter(options);
  for (const value of values) {
    out.writeDocument(value);
  }
  return out.bytes().slice();
}

/**
 * Decodes every document of a buffer of concatenated documents.
 */
export function decodeSequence(data: Uint8Array, options: SequenceReaderOptions = {}): DecodedValue[] {
  return [...new SequenceReader(data, options).documents()];
}
