import { describe, it, expect } from 'vitest';
import { Writer } from './writer';
import { Reader } from './reader';
import { InvalidNameError, InvalidStringError } from './errors';
import { BinarySubtype, ElementType } from './types';

describe('Writer', () => {
  describe('int32', () => {
    it('encodes 1 little-endian', () => {
      const writer = new Writer();
      writer.writeInt32(1);
      expect(writer.bytes()).toEqual(new Uint8Array([1, 0, 0, 0]));
    });

    it('encodes -1', () => {
      const writer = new Writer();
      writer.writeInt32(-1);
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff]));
    });
  });

  describe('64-bit values', () => {
    it('encodes int64 -2', () => {
      const writer = new Writer();
      writer.writeInt64(-2n);
      expect(writer.bytes()).toEqual(new Uint8Array([0xfe, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]));
    });

    it('encodes uint64 2^63', () => {
      const writer = new Writer();
      writer.writeUint64(2n ** 63n);
      expect(writer.bytes()).toEqual(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 0x80]));
    });

    it('encodes double 1.0', () => {
      const writer = new Writer();
      writer.writeDouble(1.0);
      expect(writer.bytes()).toEqual(new Uint8Array([0, 0, 0, 0, 0, 0, 0xf0, 0x3f]));
    });
  });

  describe('cstring', () => {
    it('appends a NUL to the UTF-8 bytes', () => {
      const writer = new Writer();
      writer.writeCString('key');
      expect(writer.bytes()).toEqual(new Uint8Array([0x6b, 0x65, 0x79, 0]));
    });

    it('writes numbers in decimal', () => {
      const writer = new Writer();
      writer.writeCString(17);
      expect(writer.bytes()).toEqual(new Uint8Array([0x31, 0x37, 0]));
    });

    it('writes byte names verbatim', () => {
      const writer = new Writer();
      writer.writeCString(new Uint8Array([0xff, 0xfe]));
      expect(writer.bytes()).toEqual(new Uint8Array([0xff, 0xfe, 0]));
    });

    it('rejects names containing NUL', () => {
      const writer = new Writer();
      expect(() => writer.writeCString('a\u0000b')).toThrow(InvalidNameError);
      expect(() => writer.writeCString(new Uint8Array([0x61, 0]))).toThrow(InvalidNameError);
    });
  });

  describe('string', () => {
    it('encodes "hi"', () => {
      const writer = new Writer();
      writer.writeString('hi');
      expect(writer.bytes()).toEqual(new Uint8Array([3, 0, 0, 0, 0x68, 0x69, 0]));
    });

    it('encodes empty string', () => {
      const writer = new Writer();
      writer.writeString('');
      expect(writer.bytes()).toEqual(new Uint8Array([1, 0, 0, 0, 0]));
    });

    it('counts UTF-8 bytes, not characters', () => {
      const writer = new Writer();
      writer.writeString('é');
      expect(writer.bytes()).toEqual(new Uint8Array([3, 0, 0, 0, 0xc3, 0xa9, 0]));
    });

    it('writes surrogate pairs as one code point', () => {
      const writer = new Writer();
      writer.writeString('\ud83d\ude0e');
      expect(writer.bytes()).toEqual(new Uint8Array([5, 0, 0, 0, 0xf0, 0x9f, 0x98, 0x8e, 0]));
    });

    it('rejects lone surrogates', () => {
      const writer = new Writer();
      expect(() => writer.writeString('a\ud800')).toThrow(InvalidStringError);
      expect(() => writer.writeString('\udc00b')).toThrow(InvalidStringError);
      expect(() => writer.writeCString('\ud800')).toThrow(InvalidStringError);
      expect(writer.position).toBe(0);
    });
  });

  describe('binary', () => {
    it('writes length, subtype and bytes', () => {
      const writer = new Writer();
      writer.writeBinary(new Uint8Array([1, 2]));
      expect(writer.bytes()).toEqual(new Uint8Array([2, 0, 0, 0, 0, 1, 2]));
    });

    it('writes the uuid subtype', () => {
      const writer = new Writer();
      writer.writeBinary(new Uint8Array([9]), BinarySubtype.Uuid);
      expect(writer.bytes()).toEqual(new Uint8Array([1, 0, 0, 0, 4, 9]));
    });
  });

  describe('element header', () => {
    it('writes tag then name', () => {
      const writer = new Writer();
      writer.writeElementHeader(ElementType.Boolean, 'a');
      expect(writer.bytes()).toEqual(new Uint8Array([0x08, 0x61, 0]));
    });
  });

  describe('length back-patching', () => {
    it('patches the span including the prefix itself', () => {
      const writer = new Writer();
      const at = writer.reserveLength();
      writer.writeByte(0);
      writer.patchLength(at);
      expect(writer.bytes()).toEqual(new Uint8Array([5, 0, 0, 0, 0]));
    });

    it('patches a nested prefix at its own offset', () => {
      const writer = new Writer();
      writer.writeByte(0xaa);
      const at = writer.reserveLength();
      writer.writeBytes(new Uint8Array([1, 2, 3]));
      writer.patchLength(at);
      expect(writer.bytes()).toEqual(new Uint8Array([0xaa, 7, 0, 0, 0, 1, 2, 3]));
    });
  });

  describe('buffer growth', () => {
    it('grows past its initial capacity', () => {
      const writer = new Writer(1);
      for (let i = 0; i < 100; i++) {
        writer.writeInt32(i);
      }
      expect(writer.position).toBe(400);

      const reader = new Reader(writer.bytes());
      for (let i = 0; i < 100; i++) {
        expect(reader.readInt32()).toBe(i);
      }
      expect(reader.hasMore).toBe(false);
    });
  });

  describe('reset', () => {
    it('discards written data', () => {
      const writer = new Writer();
      writer.writeInt32(42);
      writer.reset();
      expect(writer.position).toBe(0);
      expect(writer.bytes()).toEqual(new Uint8Array([]));
    });
  });
});
