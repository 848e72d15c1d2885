import { describe, it, expect, beforeEach } from 'vitest';
import {
  Registry,
  classTypeName,
  defaultRegistry,
  isCodable,
  isCodableClass,
  registerClass,
  typeNameOf,
} from './registry';
import { MissingClassDefinitionError } from './errors';
import { BsonDocument, DecodedDocument } from './values';

class Point {
  constructor(readonly x: number, readonly y: number) {}

  bsonEncode(): BsonDocument {
    return { x: this.x, y: this.y };
  }

  static bsonDecode(doc: DecodedDocument): Point {
    return new Point(Number(doc.x), Number(doc.y));
  }
}

class Renamed {
  static readonly bsonTypeName = 'geo.Renamed';

  bsonEncode(): BsonDocument {
    return {};
  }

  static bsonDecode(): Renamed {
    return new Renamed();
  }
}

class Plain {
  value = 1;
}

describe('Registry', () => {
  let registry: Registry;

  beforeEach(() => {
    registry = new Registry();
  });

  it('registers a builder under a name', () => {
    registry.register('Thing', () => ({ built: true }));
    expect(registry.isRegistered('Thing')).toBe(true);
    expect(registry.lookup('Thing')({})).toEqual({ built: true });
  });

  it('throws for unknown names', () => {
    expect(() => registry.lookup('Missing')).toThrow(MissingClassDefinitionError);
    expect(() => registry.lookup('Missing')).toThrow('No class definition for class Missing');
  });

  it('replaces an earlier registration', () => {
    registry.register('Thing', () => ({ version: 1 }));
    registry.register('Thing', () => ({ version: 2 }));
    expect(registry.lookup('Thing')({})).toEqual({ version: 2 });
  });

  it('registers classes under their name', () => {
    expect(registry.registerClass(Point)).toBe('Point');
    const point = registry.lookup('Point')({ x: 3, y: 4 });
    expect(point).toBeInstanceOf(Point);
    expect(point).toEqual(new Point(3, 4));
  });

  it('uses a static bsonTypeName when present', () => {
    expect(registry.registerClass(Renamed)).toBe('geo.Renamed');
    expect(registry.isRegistered('Renamed')).toBe(false);
  });

  it('registers every codable class of a namespace', () => {
    const namespace = { Point, Renamed, Plain, helper: () => 1, answer: 42 };
    expect(registry.registerAll(namespace)).toEqual(['Point', 'geo.Renamed']);
    expect(registry.isRegistered('Plain')).toBe(false);
  });

  it('clears registrations', () => {
    registry.registerClass(Point);
    registry.clear();
    expect(registry.isRegistered('Point')).toBe(false);
  });

  it('keeps separate registries independent', () => {
    registry.registerClass(Point);
    expect(new Registry().isRegistered('Point')).toBe(false);
  });
});

describe('default registry', () => {
  beforeEach(() => {
    defaultRegistry.clear();
  });

  it('is shared by the module-level helpers', () => {
    registerClass(Point);
    expect(defaultRegistry.isRegistered('Point')).toBe(true);
  });
});

describe('codable detection', () => {
  it('recognizes instances with bsonEncode', () => {
    expect(isCodable(new Point(1, 2))).toBe(true);
    expect(isCodable(new Plain())).toBe(false);
    expect(isCodable(null)).toBe(false);
  });

  it('recognizes registrable classes', () => {
    expect(isCodableClass(Point)).toBe(true);
    expect(isCodableClass(Plain)).toBe(false);
    expect(isCodableClass(() => 1)).toBe(false);
  });

  it('derives type names', () => {
    expect(typeNameOf(new Point(1, 2))).toBe('Point');
    expect(typeNameOf(new Renamed())).toBe('geo.Renamed');
    expect(classTypeName(Renamed)).toBe('geo.Renamed');
  });
});
