/**
 * Base error class for codec errors.
 */
export class BsonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BsonError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends BsonError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends BsonError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when an element name contains a NUL byte.
 */
export class InvalidNameError extends EncodeError {
  readonly key: string;

  constructor(key: string) {
    super(`Element names may not include NUL bytes: ${JSON.stringify(key)}`);
    this.name = "InvalidNameError";
    this.key = key;
  }
}

/**
 * Error thrown when a string holds a lone UTF-16 surrogate, which has no
 * UTF-8 encoding.
 */
export class InvalidStringError extends EncodeError {
  readonly value: string;

  constructor(value: string) {
    super(`String contains a lone surrogate: ${JSON.stringify(value)}`);
    this.name = "InvalidStringError";
    this.value = value;
  }
}

/**
 * Error thrown when a value has no encoding and no unknown-value hook is set.
 */
export class UnknownSerializerError extends EncodeError {
  readonly key: string;
  readonly value: unknown;

  constructor(key: string, value: unknown) {
    super(`Unable to serialize: key ${JSON.stringify(key)} value: ${describe(value)} type: ${typeName(value)}`);
    this.name = "UnknownSerializerError";
    this.key = key;
    this.value = value;
  }
}

/**
 * Error thrown when an integer does not fit any integer element type.
 */
export class IntegerOverflowError extends EncodeError {
  constructor(value: bigint, min: bigint, max: bigint) {
    super(`Integer ${value} is outside the encodable range [${min}, ${max}]`);
    this.name = "IntegerOverflowError";
  }
}

/**
 * Error thrown when a document is structurally invalid.
 */
export class MalformedDocumentError extends DecodeError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedDocumentError";
  }
}

/**
 * Error thrown when the buffer ends before a value is complete.
 */
export class BufferUnderflowError extends MalformedDocumentError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when an element carries an unrecognized type tag.
 */
export class UnknownElementTypeError extends DecodeError {
  readonly elementType: number;

  constructor(elementType: number) {
    super(`Unknown element type: 0x${elementType.toString(16).padStart(2, "0")}`);
    this.name = "UnknownElementTypeError";
    this.elementType = elementType;
  }
}

/**
 * Error thrown when a string payload is not valid UTF-8.
 */
export class InvalidUtf8Error extends DecodeError {
  constructor(offset: number) {
    super(`Invalid UTF-8 in string at offset ${offset}`);
    this.name = "InvalidUtf8Error";
  }
}

/**
 * Error thrown when a decoded class marker names an unregistered type.
 */
export class MissingClassDefinitionError extends DecodeError {
  readonly className: string;

  constructor(className: string) {
    super(`No class definition for class ${className}`);
    this.name = "MissingClassDefinitionError";
    this.className = className;
  }
}

/**
 * Error thrown when a document in a sequence exceeds the configured size.
 */
export class DocumentSizeExceededError extends DecodeError {
  constructor(size: number, maxSize: number) {
    super(`Document size ${size} exceeds maximum ${maxSize}`);
    this.name = "DocumentSizeExceededError";
  }
}

/**
 * Non-fatal condition reported when a timestamp carries no timezone and is
 * encoded as UTC. Passed to `EncodeOptions.onWarning`, never thrown.
 */
export class MissingTimezoneWarning extends Error {
  constructor(message: string = "Input datetime has no timezone, assuming UTC.") {
    super(message);
    this.name = "MissingTimezoneWarning";
  }
}

function typeName(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object" || typeof value === "function") {
    return value.constructor?.name ?? typeof value;
  }
  return typeof value;
}

function describe(value: unknown): string {
  try {
    return String(value);
  } catch {
    return "[unprintable]";
  }
}
