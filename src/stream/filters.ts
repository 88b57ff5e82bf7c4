/**
 * Stream decoding filters.
 *
 * Only what is needed to read object streams and xref streams: content
 * streams are never decoded, the serializer writes them back as found.
 */

import { inflate } from './inflate.js';
import { hexValue, isWhitespace } from '../parser/lexer.js';
import { StructuralError } from '../errors.js';

export function flateDecode(data: Uint8Array): Uint8Array {
  try {
    return inflate(data);
  } catch (err) {
    throw new StructuralError('FlateDecode decompression failed', undefined, { cause: err });
  }
}

export function asciiHexDecode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let high = -1;

  for (const c of data) {
    if (c === 0x3e) break; // EOD
    const v = hexValue(c);
    if (v === -1) continue;
    if (high === -1) {
      high = v;
    } else {
      out.push((high << 4) | v);
      high = -1;
    }
  }
  if (high !== -1) out.push(high << 4);

  return new Uint8Array(out);
}

export function ascii85Decode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  const group: number[] = [];

  const flush = (): void => {
    const n = group.length;
    if (n === 0) return;
    while (group.length < 5) group.push(84); // pad with 'u'
    let value = 0;
    for (const digit of group) value = value * 85 + digit;
    for (let i = 0; i < n - 1; i++) {
      out.push(Math.floor(value / 2 ** (24 - 8 * i)) & 0xff);
    }
    group.length = 0;
  };

  let i = data.length >= 2 && data[0] === 0x3c && data[1] === 0x7e ? 2 : 0;
  for (; i < data.length; i++) {
    const c = data[i];
    if (c === 0x7e) break; // ~> EOD
    if (isWhitespace(c)) continue;
    if (c === 0x7a && group.length === 0) {
      out.push(0, 0, 0, 0);
      continue;
    }
    if (c < 0x21 || c > 0x75) continue;
    group.push(c - 0x21);
    if (group.length === 5) flush();
  }
  flush();

  return new Uint8Array(out);
}

export function lzwDecode(data: Uint8Array, earlyChange = 1): Uint8Array {
  const CLEAR = 256;
  const EOD = 257;
  const out: number[] = [];
  let table: number[][] = [];
  let codeSize = 9;
  let prev: number[] | null = null;
  let bitPos = 0;

  const reset = (): void => {
    table = [];
    for (let i = 0; i < 256; i++) table.push([i]);
    table.push([], []); // CLEAR, EOD
    codeSize = 9;
    prev = null;
  };

  const readCode = (): number => {
    let code = 0;
    for (let i = 0; i < codeSize; i++, bitPos++) {
      const byte = data[bitPos >> 3] ?? 0;
      code = (code << 1) | ((byte >> (7 - (bitPos & 7))) & 1);
    }
    return code;
  };

  reset();
  while (bitPos + codeSize <= data.length * 8) {
    const code = readCode();
    if (code === EOD) break;
    if (code === CLEAR) {
      reset();
      continue;
    }

    let entry: number[];
    if (code < table.length) {
      entry = table[code];
    } else if (code === table.length && prev) {
      entry = [...prev, prev[0]];
    } else {
      break;
    }

    out.push(...entry);
    if (prev) table.push([...prev, entry[0]]);
    prev = entry;

    if (table.length >= (1 << codeSize) - earlyChange && codeSize < 12) codeSize++;
  }

  return new Uint8Array(out);
}

export function runLengthDecode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let i = 0;
  while (i < data.length) {
    const len = data[i++];
    if (len === 128) break; // EOD
    if (len < 128) {
      for (let j = 0; j <= len && i < data.length; j++) out.push(data[i++]);
    } else {
      const byte = data[i++] ?? 0;
      for (let j = 0; j < 257 - len; j++) out.push(byte);
    }
  }
  return new Uint8Array(out);
}

/** Undo PNG row prediction (predictors 10-15); each row starts with its filter type byte. */
export function applyPngPredictor(data: Uint8Array, columns: number, colors = 1, bitsPerComponent = 8): Uint8Array {
  const bpp = Math.max(1, Math.ceil((colors * bitsPerComponent) / 8));
  const rowBytes = Math.ceil((columns * colors * bitsPerComponent) / 8);
  if (rowBytes <= 0) return data;

  const rows = Math.floor(data.length / (rowBytes + 1));
  const out = new Uint8Array(rows * rowBytes);

  for (let row = 0; row < rows; row++) {
    const src = row * (rowBytes + 1);
    const dst = row * rowBytes;
    const filter = data[src];

    for (let col = 0; col < rowBytes; col++) {
      const raw = data[src + 1 + col];
      const left = col >= bpp ? out[dst + col - bpp] : 0;
      const up = row > 0 ? out[dst - rowBytes + col] : 0;
      const upLeft = row > 0 && col >= bpp ? out[dst - rowBytes + col - bpp] : 0;

      let predicted: number;
      switch (filter) {
        case 1: predicted = left; break;
        case 2: predicted = up; break;
        case 3: predicted = (left + up) >> 1; break;
        case 4: predicted = paeth(left, up, upLeft); break;
        default: predicted = 0;
      }
      out[dst + col] = (raw + predicted) & 0xff;
    }
  }

  return out;
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  return pb <= pc ? b : c;
}
