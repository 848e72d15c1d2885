import { describe, it, expect } from 'vitest';
import { classify, isDocumentSource, isPlainObject, keyToString } from './classify';
import { IntegerOverflowError, UnknownSerializerError } from './errors';
import { BinarySubtype, ElementType } from './types';
import { Double, LocalDateTime, Uuid } from './values';

class Temperature {
  constructor(readonly celsius: number) {}

  bsonEncode() {
    return { celsius: this.celsius };
  }
}

describe('classify', () => {
  it('checks booleans before integers', () => {
    expect(classify(true, 'k')).toEqual({ type: ElementType.Boolean, value: true });
    expect(classify(1, 'k')).toEqual({ type: ElementType.Int32, value: 1 });
  });

  it('classifies wrapped whole numbers as doubles', () => {
    expect(classify(new Double(2), 'k')).toEqual({ type: ElementType.Double, value: 2 });
  });

  it('keeps 64-bit values as bigint', () => {
    expect(classify(2 ** 32, 'k')).toEqual({ type: ElementType.Int64, value: 4294967296n });
    expect(classify(2n ** 64n - 1n, 'k')).toEqual({ type: ElementType.UInt64, value: 18446744073709551615n });
  });

  it('throws IntegerOverflowError past 2^64 - 1', () => {
    expect(() => classify(2n ** 64n, 'k')).toThrow(IntegerOverflowError);
  });

  it('marks uuids with subtype 4', () => {
    const id = new Uuid(new Uint8Array(16));
    expect(classify(id, 'k')).toEqual({ type: ElementType.Binary, value: id.bytes, subtype: BinarySubtype.Uuid });
  });

  it('flags local datetimes as naive', () => {
    expect(classify(new LocalDateTime(1970, 1, 1, 0, 0, 2), 'k')).toEqual({
      type: ElementType.DateTime,
      value: 2000n,
      naive: true,
    });
    expect(classify(new Date(2000), 'k')).toEqual({ type: ElementType.DateTime, value: 2000n, naive: false });
  });

  it('distinguishes documents, arrays and custom objects', () => {
    const doc = { a: 1 };
    const list = [1];
    const temp = new Temperature(20);
    expect(classify(doc, 'k')).toEqual({ type: ElementType.Document, value: doc });
    expect(classify(list, 'k')).toEqual({ type: ElementType.Array, value: list });
    expect(classify(temp, 'k')).toEqual({ type: ElementType.Document, value: temp, custom: true });
  });

  it('substitutes through the hook until a type is found', () => {
    const hook = (value: unknown) => (typeof value === 'symbol' ? value.description : value);
    expect(classify(Symbol('tag'), 'k', hook)).toEqual({ type: ElementType.String, value: 'tag' });
  });

  it('throws UnknownSerializerError without a hook', () => {
    expect(() => classify(new WeakMap(), 'field')).toThrow(UnknownSerializerError);
    expect(() => classify(new WeakMap(), 'field')).toThrow(/key "field"/);
  });
});

describe('helpers', () => {
  it('recognizes plain objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject(new Temperature(1))).toBe(false);
    expect(isPlainObject([])).toBe(false);
  });

  it('treats Maps as documents', () => {
    expect(isDocumentSource(new Map())).toBe(true);
    expect(isDocumentSource(new Set())).toBe(false);
  });

  it('renders byte keys one char per byte', () => {
    expect(keyToString(new Uint8Array([0x61, 0xff]))).toBe('aÿ');
    expect(keyToString(3)).toBe('3');
  });
});
