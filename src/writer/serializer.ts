/**
 * PDF serializer: writes a full, uncompressed rewrite of a document.
 *
 * Only objects reachable from the trailer's /Root and /Info are written, under
 * their original numbers. Object streams and xref streams are not reproduced
 * (their members become ordinary objects), and encryption is dropped because
 * the parser holds decrypted strings and streams.
 */

import type { PdfObject, PdfDict, PdfRef } from '../parser/types.js';
import { isStream, pdfDict, pdfNumber } from '../parser/types.js';
import { isDelimiter } from '../parser/lexer.js';
import { StructuralError } from '../errors.js';

/** What the serializer needs from a parsed document */
export interface SerializableDocument {
  readonly version: string;
  readonly trailer: PdfDict;
  getObject(objNum: number, gen: number): PdfObject;
}

/** Stream types that belong to the file structure rather than the document */
const STRUCTURAL_STREAM_TYPES = new Set(['XRef', 'ObjStm']);

/** Trailer keys carried over into the rewritten file */
const KEPT_TRAILER_KEYS = ['Root', 'Info', 'ID'];

const encoder = new TextEncoder();

export function serializeDocument(doc: SerializableDocument): Uint8Array {
  const objects = collectReachable(doc);
  const chunks: Uint8Array[] = [];
  let offset = 0;

  const emit = (chunk: Uint8Array | string): void => {
    const bytes = typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
    chunks.push(bytes);
    offset += bytes.length;
  };

  emit(`%PDF-${doc.version}\n`);
  emit(new Uint8Array([0x25, 0xe2, 0xe3, 0xcf, 0xd3, 0x0a])); // binary marker comment

  const offsets = new Map<number, { offset: number; gen: number }>();
  let maxObjNum = 0;
  for (const [ref, obj] of objects) {
    offsets.set(ref.objNum, { offset, gen: ref.gen });
    maxObjNum = Math.max(maxObjNum, ref.objNum);
    emit(`${ref.objNum} ${ref.gen} obj\n`);
    if (isStream(obj)) {
      const dict = pdfDict(new Map(obj.dict.entries));
      dict.entries.set('Length', pdfNumber(obj.data.length));
      emit(serializeObject(dict));
      emit('\nstream\n');
      emit(obj.data);
      emit('\nendstream');
    } else {
      emit(serializeObject(obj));
    }
    emit('\nendobj\n');
  }

  const size = maxObjNum + 1;
  const xrefOffset = offset;
  const lines = ['xref\n', `0 ${size}\n`, '0000000000 65535 f \n'];
  for (let num = 1; num < size; num++) {
    const entry = offsets.get(num);
    lines.push(entry
      ? `${String(entry.offset).padStart(10, '0')} ${String(entry.gen).padStart(5, '0')} n \n`
      : '0000000000 00000 f \n');
  }
  emit(lines.join(''));

  const trailer = pdfDict(new Map([['Size', pdfNumber(size)]]));
  for (const key of KEPT_TRAILER_KEYS) {
    const value = doc.trailer.entries.get(key);
    if (value) trailer.entries.set(key, value);
  }
  emit(`trailer\n${serializeObject(trailer)}\nstartxref\n${xrefOffset}\n%%EOF\n`);

  const out = new Uint8Array(offset);
  let at = 0;
  for (const chunk of chunks) {
    out.set(chunk, at);
    at += chunk.length;
  }
  return out;
}

/**
 * Indirect objects reachable from the trailer, sorted by object number.
 * References to free or missing objects are left dangling (readers treat
 * them as null).
 */
function collectReachable(doc: SerializableDocument): Array<[PdfRef, PdfObject]> {
  const found = new Map<number, [PdfRef, PdfObject]>();
  const pending: PdfObject[] = KEPT_TRAILER_KEYS
    .map(key => doc.trailer.entries.get(key))
    .filter((value): value is PdfObject => value !== undefined);

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;

    switch (node.kind) {
      case 'ref': {
        if (found.has(node.objNum)) break;
        const target = doc.getObject(node.objNum, node.gen);
        if (target.kind === 'null') break;
        if (isStream(target) && STRUCTURAL_STREAM_TYPES.has(nameOf(target.dict.entries.get('Type')))) break;
        found.set(node.objNum, [node, target]);
        pending.push(target);
        break;
      }
      case 'dict':
        for (const value of node.entries.values()) pending.push(value);
        break;
      case 'stream':
        for (const value of node.dict.entries.values()) pending.push(value);
        break;
      case 'array':
        for (const item of node.items) pending.push(item);
        break;
      case 'name':
      case 'string':
      case 'number':
      case 'bool':
      case 'null':
        break;
    }
  }

  return [...found.values()].sort(([a], [b]) => a.objNum - b.objNum);
}

function nameOf(obj: PdfObject | undefined): string {
  return obj?.kind === 'name' ? obj.value : '';
}

/** Serialize a direct object. Streams must be written by the caller. */
export function serializeObject(obj: PdfObject): string {
  switch (obj.kind) {
    case 'ref':
      return `${obj.objNum} ${obj.gen} R`;
    case 'name':
      return serializeName(obj.value);
    case 'string':
      return serializeString(obj.value);
    case 'number':
      return serializeNumber(obj.value);
    case 'bool':
      return obj.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'array':
      return `[${obj.items.map(serializeObject).join(' ')}]`;
    case 'dict': {
      const body = [...obj.entries]
        .map(([key, value]) => `${serializeName(key)} ${serializeObject(value)}`)
        .join(' ');
      return body ? `<< ${body} >>` : '<< >>';
    }
    case 'stream':
      throw new StructuralError('A stream cannot be embedded as a direct object');
  }
}

export function serializeName(name: string): string {
  let out = '/';
  for (let i = 0; i < name.length; i++) {
    const code = name.charCodeAt(i) & 0xff;
    if (code < 0x21 || code > 0x7e || code === 0x23 || isDelimiter(code)) {
      out += `#${code.toString(16).padStart(2, '0').toUpperCase()}`;
    } else {
      out += name[i];
    }
  }
  return out;
}

/**
 * Literal string with the bytes that need it escaped. Non-ASCII bytes become
 * octal escapes so the output stays 7-bit clean outside of stream bodies.
 */
export function serializeString(bytes: Uint8Array): string {
  let out = '(';
  for (const b of bytes) {
    if (b === 0x28 || b === 0x29 || b === 0x5c) {
      out += `\\${String.fromCharCode(b)}`;
    } else if (b < 0x20 || b > 0x7e) {
      out += `\\${b.toString(8).padStart(3, '0')}`;
    } else {
      out += String.fromCharCode(b);
    }
  }
  return `${out})`;
}

export function serializeNumber(value: number): string {
  if (!Number.isFinite(value)) return '0';
  // String() switches to exponent form from 1e21 on, which PDF has no syntax for
  if (Number.isInteger(value)) return Math.abs(value) < 1e21 ? String(value) : BigInt(value).toString();
  // Keep about six significant digits for small magnitudes
  const digits = Math.min(100, Math.max(10, Math.ceil(-Math.log10(Math.abs(value))) + 6));
  const fixed = value.toFixed(digits).replace(/0+$/, '').replace(/\.$/, '');
  return fixed === '-0' ? '0' : fixed;
}
