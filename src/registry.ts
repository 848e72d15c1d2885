import { MissingClassDefinitionError } from "./errors";
import { BsonCodable, DecodedDocument } from "./values";

/**
 * Builds an instance from its decoded document. The document still holds the
 * class marker element.
 */
export type Builder<T extends object = object> = (document: DecodedDocument) => T;

/**
 * A class whose instances round-trip through the registry.
 *
 * @example
 * ```typescript
 * class Point implements BsonCodable {
 *   constructor(readonly x: number, readonly y: number) {}
 *   bsonEncode() { return { x: this.x, y: this.y }; }
 *   static bsonDecode(doc: DecodedDocument) { return new Point(Number(doc.x), Number(doc.y)); }
 * }
 * registerClass(Point);
 * ```
 */
export interface CodableClass<T extends BsonCodable = BsonCodable> {
  readonly name: string;
  readonly bsonTypeName?: string;
  readonly prototype: T;
  bsonDecode(document: DecodedDocument): T;
}

/**
 * Returns true if the value provides its own document encoding.
 */
export function isCodable(value: unknown): value is BsonCodable {
  return (
    typeof value === "object" &&
    value !== null &&
    "bsonEncode" in value &&
    typeof value.bsonEncode === "function"
  );
}

/**
 * Returns true if the value is a class that can be registered.
 */
export function isCodableClass(value: unknown): value is CodableClass {
  return (
    typeof value === "function" &&
    "bsonDecode" in value &&
    typeof value.bsonDecode === "function" &&
    typeof value.prototype === "object" &&
    value.prototype !== null &&
    typeof value.prototype.bsonEncode === "function"
  );
}

/**
 * Type identifier of a class: its static `bsonTypeName`, or its name.
 */
export function classTypeName(cls: { readonly name: string; readonly bsonTypeName?: unknown }): string {
  return typeof cls.bsonTypeName === "string" ? cls.bsonTypeName : cls.name;
}

/**
 * Type identifier written into the class marker of an encoded instance.
 */
export function typeNameOf(value: BsonCodable): string {
  return classTypeName(value.constructor);
}

/**
 * Registry maps type identifiers to the builders that reconstruct them.
 */
export class Registry {
  private builders: Map<string, Builder> = new Map();

  /**
   * Registers a builder under a type identifier, replacing any earlier one.
   */
  register<T extends object>(name: string, build: Builder<T>): void {
    this.builders.set(name, build);
  }

  /**
   * Registers a class under its type identifier.
   */
  registerClass<T extends BsonCodable>(cls: CodableClass<T>): string {
    const name = classTypeName(cls);
    this.register(name, (document) => cls.bsonDecode(document));
    return name;
  }

  /**
   * Registers every codable class exported by a module namespace.
   * Returns the registered type identifiers.
   */
  registerAll(namespace: Record<string, unknown>): string[] {
    const names: string[] = [];
    for (const value of Object.values(namespace)) {
      if (isCodableClass(value)) {
        names.push(this.registerClass(value));
      }
    }
    return names;
  }

  /**
   * Gets the builder for a type identifier.
   * @throws MissingClassDefinitionError if nothing is registered under the name
   */
  lookup(name: string): Builder {
    const build = this.builders.get(name);
    if (!build) {
      throw new MissingClassDefinitionError(name);
    }
    return build;
  }

  /**
   * Checks if a type identifier is registered.
   */
  isRegistered(name: string): boolean {
    return this.builders.has(name);
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.builders.clear();
  }
}

/**
 * Global default registry instance.
 */
export const defaultRegistry = new Registry();

/**
 * Registers a builder with the default registry.
 */
export function register<T extends object>(name: string, build: Builder<T>): void {
  defaultRegistry.register(name, build);
}

/**
 * Registers a class with the default registry.
 */
export function registerClass<T extends BsonCodable>(cls: CodableClass<T>): string {
  return defaultRegistry.registerClass(cls);
}

/**
 * Registers every codable class of a module namespace with the default registry.
 */
export function registerAll(namespace: Record<string, unknown>): string[] {
  return defaultRegistry.registerAll(namespace);
}
