import { keyToString } from "./classify";
import { MalformedDocumentError, UnknownElementTypeError } from "./errors";
import { Reader } from "./reader";
import { Registry, defaultRegistry } from "./registry";
import {
  BinarySubtype,
  CLASS_NAME_KEY,
  ElementType,
  LENGTH_SIZE,
  OBJECT_ID_SIZE,
  TERMINATOR_SIZE,
  UUID_SIZE,
} from "./types";
import { DecodedDocument, DecodedValue, Double, Uuid, toHex } from "./values";

/**
 * Options for decode.
 */
export interface DecodeOptions {
  /** Registry consulted for custom objects. Default: defaultRegistry */
  registry?: Registry;
  /**
   * Decode documents as Map instead of plain objects, keeping the exact
   * element order and raw-byte names. Default: false
   */
  useMaps?: boolean;
  /**
   * Return every double as a plain number. By default doubles holding a whole
   * number come back as Double, so re-encoding keeps tag 0x01. Default: false
   */
  plainDoubles?: boolean;
}

/**
 * A decoded document and the offset just past it.
 */
export interface DecodeResult {
  end: number;
  value: DecodedValue;
}

const MIN_DOCUMENT_SIZE = LENGTH_SIZE + TERMINATOR_SIZE;

/** Largest millisecond offset a Date can hold. */
const MAX_DATE_MS = 8.64e15;

/**
 * Decoder reads documents and arrays from a Reader.
 */
export class Decoder {
  private readonly reader: Reader;
  private readonly registry: Registry;
  private readonly useMaps: boolean;
  private readonly plainDoubles: boolean;

  constructor(reader: Reader, options: DecodeOptions = {}) {
    this.reader = reader;
    this.registry = options.registry ?? defaultRegistry;
    this.useMaps = options.useMaps ?? false;
    this.plainDoubles = options.plainDoubles ?? false;
  }

  /**
   * Reads a length-prefixed document (or array) starting at the cursor and
   * leaves the cursor just past its terminator.
   */
  readDocument(asArray: boolean = false): DecodedValue {
    const base = this.reader.position;
    const length = this.reader.readInt32();
    if (length < MIN_DOCUMENT_SIZE) {
      throw new MalformedDocumentError(`Invalid document length ${length} at offset ${base}`);
    }
    const end = base + length;
    if (this.reader.peekByteAt(end - 1) !== 0) {
      throw new MalformedDocumentError(`Missing null-terminator in document at offset ${base}`);
    }

    const names: Array<string | Uint8Array> = [];
    const values: DecodedValue[] = [];
    while (this.reader.position < end - 1) {
      const type = this.reader.readByte();
      const name = this.reader.readCString();
      values.push(this.readValue(type));
      names.push(name);
    }
    if (this.reader.position !== end - 1) {
      throw new MalformedDocumentError(`Element overruns document ending at offset ${end}`);
    }
    this.reader.seek(end);

    if (asArray) {
      return values;
    }
    const markerIndex = names.lastIndexOf(CLASS_NAME_KEY);
    if (markerIndex >= 0) {
      const build = this.registry.lookup(String(values[markerIndex]));
      return build(toObject(names, values));
    }
    if (this.useMaps) {
      return new Map(names.map((name, i): [string | Uint8Array, DecodedValue] => [name, values[i]]));
    }
    return toObject(names, values);
  }

  private readValue(type: number): DecodedValue {
    switch (type) {
      case ElementType.Double:
        return this.readDouble();
      case ElementType.String:
        return this.reader.readString();
      case ElementType.Document:
        return this.readDocument(false);
      case ElementType.Array:
        return this.readDocument(true);
      case ElementType.Binary:
        return this.readBinary();
      case ElementType.ObjectId:
        return toHex(this.reader.readBytes(OBJECT_ID_SIZE));
      case ElementType.Boolean:
        return this.reader.readBool();
      case ElementType.DateTime:
        return this.readDateTime();
      case ElementType.Null:
        return null;
      case ElementType.Int32:
        return this.reader.readInt32();
      case ElementType.UInt64:
        return toSafeNumber(this.reader.readUint64());
      case ElementType.Int64:
        return toSafeNumber(this.reader.readInt64());
      default:
        throw new UnknownElementTypeError(type);
    }
  }

  private readDouble(): number | Double {
    const value = this.reader.readDouble();
    // the encoder would classify these as integers
    if (!this.plainDoubles && Number.isSafeInteger(value) && !Object.is(value, -0)) {
      return new Double(value);
    }
    return value;
  }

  private readDateTime(): Date {
    const start = this.reader.position;
    const ms = this.reader.readInt64();
    if (ms < -BigInt(MAX_DATE_MS) || ms > BigInt(MAX_DATE_MS)) {
      throw new MalformedDocumentError(`Datetime ${ms} at offset ${start} is outside the representable range`);
    }
    return new Date(Number(ms));
  }

  private readBinary(): DecodedValue {
    const start = this.reader.position;
    const { subtype, data } = this.reader.readBinary();
    if (subtype === BinarySubtype.Uuid || subtype === BinarySubtype.UuidLegacy) {
      if (data.length !== UUID_SIZE) {
        throw new MalformedDocumentError(`UUID binary at offset ${start} has ${data.length} bytes`);
      }
      return new Uuid(data);
    }
    return data;
  }
}

/**
 * Returns a number when the integer is exactly representable, else the bigint.
 */
function toSafeNumber(value: bigint): number | bigint {
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value;
}

function toObject(names: Array<string | Uint8Array>, values: DecodedValue[]): DecodedDocument {
  const out: DecodedDocument = {};
  names.forEach((name, i) => {
    // defineProperty keeps a "__proto__" name as an own property
    Object.defineProperty(out, typeof name === "string" ? name : keyToString(name), {
      value: values[i],
      enumerable: true,
      writable: true,
      configurable: true,
    });
  });
  return out;
}

/**
 * Decodes one document starting at `offset`.
 *
 * @returns the decoded value and the offset just past the document, where a
 *          following document would start
 */
export function decodeDocumentAt(data: Uint8Array, offset: number = 0, options: DecodeOptions = {}): DecodeResult {
  const reader = new Reader(data, offset);
  const value = new Decoder(reader, options).readDocument(false);
  return { end: reader.position, value };
}

/**
 * Decodes a BSON document.
 */
export function decode(data: Uint8Array, options: DecodeOptions = {}): DecodedValue {
  return decodeDocumentAt(data, 0, options).value;
}
