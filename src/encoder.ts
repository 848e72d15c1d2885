import { Element, UnknownValueHook, DocumentSource, classify, isDocumentSource, keyToString } from "./classify";
import { MissingTimezoneWarning, UnknownSerializerError } from "./errors";
import { isCodable, typeNameOf } from "./registry";
import { CLASS_NAME_KEY, ElementType } from "./types";
import { BsonCodable, Key } from "./values";
import { Writer } from "./writer";

/**
 * One ancestor on the path to the container being encoded: the container
 * (or the custom object that produced it) and the key of the element being
 * descended into.
 */
export interface TraversalStep {
  readonly parent: object;
  readonly key: Key;
}

/**
 * Chooses the order in which a document's or array's keys are encoded.
 * The returned keys are used verbatim; array keys are indices.
 */
export type TraversalHook = (container: object, stack: readonly TraversalStep[]) => Iterable<unknown>;

/**
 * Receives non-fatal conditions raised while encoding.
 */
export type WarningHandler = (warning: MissingTimezoneWarning) => void;

/**
 * Options for encode.
 */
export interface EncodeOptions {
  /** Key ordering override. Default: insertion order */
  traverse?: TraversalHook;
  /** Substitution for unsupported values. Default: throw UnknownSerializerError */
  onUnknown?: UnknownValueHook;
  /** Warning sink. Default: console.warn */
  onWarning?: WarningHandler;
}

const defaultWarningHandler: WarningHandler = (warning) => {
  console.warn(`tagwire-bson: ${warning.message}`);
};

/**
 * A container as seen by the encoder: its own key order and a lookup.
 */
interface ContainerView {
  readonly source: object;
  keys(): Iterable<unknown>;
  get(key: unknown): unknown;
}

function documentView(source: DocumentSource): ContainerView {
  if (source instanceof Map) {
    return {
      source,
      keys: () => source.keys(),
      get: (key) => source.get(key),
    };
  }
  return {
    source,
    keys: () => Object.keys(source),
    get: (key) => source[keyToString(toKey(key))],
  };
}

function arrayView(source: readonly unknown[]): ContainerView {
  return {
    source,
    keys: () => source.keys(),
    get: (key) => source[Number(key)],
  };
}

function toKey(key: unknown): Key {
  if (typeof key === "string" || typeof key === "number" || key instanceof Uint8Array) {
    return key;
  }
  return String(key);
}

/**
 * Encoder writes a value tree as a BSON document.
 */
export class Encoder {
  private readonly writer = new Writer();
  private readonly stack: TraversalStep[] = [];
  private readonly traverse: TraversalHook | undefined;
  private readonly onUnknown: UnknownValueHook | undefined;
  private readonly onWarning: WarningHandler;

  constructor(options: EncodeOptions = {}) {
    this.traverse = options.traverse;
    this.onUnknown = options.onUnknown;
    this.onWarning = options.onWarning ?? defaultWarningHandler;
  }

  /**
   * Encodes a top-level document or custom object.
   * @throws UnknownSerializerError if the value is not document-shaped
   */
  encode(value: unknown): Uint8Array {
    this.writer.reset();
    this.stack.length = 0;

    let current = value;
    for (;;) {
      if (isDocumentSource(current)) {
        this.writeContainer(documentView(current), current);
        break;
      }
      if (isCodable(current)) {
        this.writeObject(current);
        break;
      }
      if (!this.onUnknown) {
        throw new UnknownSerializerError("", current);
      }
      current = this.onUnknown(current);
    }

    return this.writer.bytes().slice();
  }

  private writeObject(obj: BsonCodable): void {
    const fields = obj.bsonEncode();
    const name = typeNameOf(obj);
    const marked: DocumentSource =
      fields instanceof Map
        ? new Map<unknown, unknown>([...fields, [CLASS_NAME_KEY, name]])
        : { ...fields, [CLASS_NAME_KEY]: name };
    this.writeContainer(documentView(marked), obj);
  }

  /**
   * Writes length prefix, elements and terminator. `parent` is recorded in
   * the traversal stack for every element.
   */
  private writeContainer(view: ContainerView, parent: object): void {
    const at = this.writer.reserveLength();
    const keys = this.traverse ? this.traverse(view.source, this.stack) : view.keys();
    for (const key of keys) {
      this.stack.push({ parent, key: toKey(key) });
      this.writeElement(toKey(key), view.get(key));
      this.stack.pop();
    }
    this.writer.writeByte(0);
    this.writer.patchLength(at);
  }

  private writeElement(name: Key, value: unknown): void {
    const element: Element = classify(value, name, this.onUnknown);
    this.writer.writeElementHeader(element.type, name);

    switch (element.type) {
      case ElementType.Double:
        this.writer.writeDouble(element.value);
        break;
      case ElementType.String:
        this.writer.writeString(element.value);
        break;
      case ElementType.Document:
        if ("custom" in element) {
          this.writeObject(element.value);
        } else {
          this.writeContainer(documentView(element.value), element.value);
        }
        break;
      case ElementType.Array:
        this.writeContainer(arrayView(element.value), element.value);
        break;
      case ElementType.Binary:
        this.writer.writeBinary(element.value, element.subtype);
        break;
      case ElementType.ObjectId:
        this.writer.writeBytes(element.value);
        break;
      case ElementType.Boolean:
        this.writer.writeBool(element.value);
        break;
      case ElementType.DateTime:
        if (element.naive) {
          this.onWarning(new MissingTimezoneWarning());
        }
        this.writer.writeInt64(element.value);
        break;
      case ElementType.Null:
        break;
      case ElementType.Int32:
        this.writer.writeInt32(element.value);
        break;
      case ElementType.Int64:
        this.writer.writeInt64(element.value);
        break;
      case ElementType.UInt64:
        this.writer.writeUint64(element.value);
        break;
    }
  }
}

/**
 * Encodes a document or custom object.
 */
export function encode(value: unknown, options: EncodeOptions = {}): Uint8Array {
  return new Encoder(options).encode(value);
}
