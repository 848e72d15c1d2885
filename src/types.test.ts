import { describe, it, expect } from 'vitest';
import {
  ElementType,
  MaxInt32,
  MaxInt64,
  MaxUInt64,
  MinInt32,
  MinInt64,
  integerElementType,
  isElementType,
} from './types';

describe('integerElementType', () => {
  it('selects int32 inside the 32-bit range', () => {
    expect(integerElementType(0n)).toBe(ElementType.Int32);
    expect(integerElementType(MaxInt32)).toBe(ElementType.Int32);
    expect(integerElementType(MinInt32)).toBe(ElementType.Int32);
  });

  it('selects int64 just outside the 32-bit range', () => {
    expect(integerElementType(MaxInt32 + 1n)).toBe(ElementType.Int64);
    expect(integerElementType(MinInt32 - 1n)).toBe(ElementType.Int64);
    expect(integerElementType(MinInt64)).toBe(ElementType.Int64);
    expect(integerElementType(MaxInt64 - 1n)).toBe(ElementType.Int64);
  });

  it('selects uint64 from the signed 64-bit maximum up', () => {
    expect(integerElementType(MaxInt64)).toBe(ElementType.UInt64);
    expect(integerElementType(MaxInt64 + 1n)).toBe(ElementType.UInt64);
    expect(integerElementType(MaxUInt64)).toBe(ElementType.UInt64);
  });

  it('returns undefined outside every width', () => {
    expect(integerElementType(MaxUInt64 + 1n)).toBeUndefined();
    expect(integerElementType(MinInt64 - 1n)).toBeUndefined();
  });
});

describe('isElementType', () => {
  it('accepts supported tags', () => {
    for (const tag of [0x01, 0x02, 0x03, 0x04, 0x05, 0x07, 0x08, 0x09, 0x0a, 0x10, 0x11, 0x12]) {
      expect(isElementType(tag)).toBe(true);
    }
  });

  it('rejects excluded tags', () => {
    for (const tag of [0x00, 0x06, 0x0b, 0x0c, 0x0d, 0x0e, 0x0f, 0x13, 0xff]) {
      expect(isElementType(tag)).toBe(false);
    }
  });
});
