import { describe, it, expect } from 'vitest';
import { deflateSync } from 'node:zlib';
import {
  flateDecode, asciiHexDecode, ascii85Decode, lzwDecode, runLengthDecode, applyPngPredictor,
} from '../../src/stream/filters.js';
import { StructuralError } from '../../src/errors.js';

const encode = (s: string) => new TextEncoder().encode(s);
const decode = (b: Uint8Array) => new TextDecoder().decode(b);

describe('Stream Filters', () => {
  describe('flateDecode', () => {
    it('decompresses zlib data', () => {
      const compressed = new Uint8Array(deflateSync(encode('Hello, World!')));
      expect(decode(flateDecode(compressed))).toBe('Hello, World!');
    });

    it('raises a StructuralError for data that is not zlib', () => {
      expect(() => flateDecode(new Uint8Array([1, 2, 3, 4]))).toThrow(StructuralError);
      expect(() => flateDecode(new Uint8Array([1, 2, 3, 4]))).toThrow('FlateDecode decompression failed');
    });
  });

  describe('asciiHexDecode', () => {
    it('decodes hex digits, ignoring whitespace', () => {
      expect(decode(asciiHexDecode(encode('48 65 6C\n6C 6F>')))).toBe('Hello');
    });

    it('pads an odd final digit with zero', () => {
      expect(asciiHexDecode(encode('4>'))).toEqual(new Uint8Array([0x40]));
    });
  });

  describe('ascii85Decode', () => {
    it('decodes full and partial groups', () => {
      expect(decode(ascii85Decode(encode('87cURDZ~>')))).toBe('Hello');
    });

    it('expands z to four zero bytes and strips the <~ prefix', () => {
      expect(ascii85Decode(encode('<~z~>'))).toEqual(new Uint8Array([0, 0, 0, 0]));
    });
  });

  describe('lzwDecode', () => {
    it('decodes a stream with repeated sequences', () => {
      const encoded = new Uint8Array([0x80, 0x0b, 0x60, 0x50, 0x22, 0x0c, 0x0c, 0x85, 0x01]);
      expect(lzwDecode(encoded)).toEqual(new Uint8Array([45, 45, 45, 45, 45, 65, 45, 45, 45, 66]));
    });
  });

  describe('runLengthDecode', () => {
    it('copies literal runs and repeats replicated bytes', () => {
      const encoded = new Uint8Array([2, 0x41, 0x42, 0x43, 254, 0x5a, 128, 0x41]);
      expect(decode(runLengthDecode(encoded))).toBe('ABCZZZ');
    });
  });

  describe('applyPngPredictor', () => {
    it('undoes the Up filter row by row', () => {
      const data = new Uint8Array([2, 1, 2, 2, 1, 1]);
      expect(applyPngPredictor(data, 2)).toEqual(new Uint8Array([1, 2, 2, 3]));
    });

    it('undoes the Sub filter', () => {
      const data = new Uint8Array([1, 5, 1, 1]);
      expect(applyPngPredictor(data, 3)).toEqual(new Uint8Array([5, 6, 7]));
    });
  });
});
