/**
 * Cross-reference readers.
 *
 * Handles classic xref tables (PDF 1.0+), cross-reference streams (PDF 1.5+)
 * and, for files whose xref is unusable, a full scan for object headers.
 */

import { PdfLexer } from './lexer.js';
import { readDict } from './objects.js';
import { StructuralError } from '../errors.js';
import type { XRefTable, TrailerInfo, PdfDict } from './types.js';
import { dictGet, dictGetNumber, dictGetName, dictGetRef, isArray, isNumber } from './types.js';

const STARTXREF_MARKER = new TextEncoder().encode('startxref');
const OBJ_MARKER = new TextEncoder().encode(' obj');
const TRAILER_MARKER = new TextEncoder().encode('trailer');

export interface XRefSection {
  readonly table: XRefTable;
  readonly trailer: TrailerInfo;
}

/** Locate the startxref offset by scanning backward from the end of the file. */
export function findStartXRef(lexer: PdfLexer): number {
  const pos = lexer.findLast(STARTXREF_MARKER);
  if (pos === -1) {
    throw new StructuralError('Could not find startxref marker');
  }

  lexer.position = pos + STARTXREF_MARKER.length;
  const token = lexer.nextToken();
  if (token.type !== 'number') {
    throw new StructuralError('Invalid startxref offset', token.offset);
  }
  return token.value;
}

/** Parse a classic `xref` section and the trailer that follows it. */
export function parseXRefTable(lexer: PdfLexer, offset: number): XRefSection {
  const table: XRefTable = new Map();

  lexer.position = offset;
  const keyword = lexer.nextToken();
  if (keyword.type !== 'keyword' || keyword.value !== 'xref') {
    throw new StructuralError(`Expected 'xref' at offset ${offset}`, offset);
  }

  for (;;) {
    const head = lexer.nextToken();
    if (head.type === 'keyword' && head.value === 'trailer') break;
    if (head.type !== 'number') {
      throw new StructuralError('Malformed xref subsection header', head.offset);
    }
    const countToken = lexer.nextToken();
    if (countToken.type !== 'number') {
      throw new StructuralError('Malformed xref subsection header', countToken.offset);
    }

    for (let i = 0; i < countToken.value; i++) {
      const entryOffset = lexer.nextToken();
      const gen = lexer.nextToken();
      const type = lexer.nextToken();
      if (entryOffset.type !== 'number' || gen.type !== 'number' || type.type !== 'keyword') {
        throw new StructuralError('Malformed xref entry', entryOffset.offset);
      }
      const objNum = head.value + i;
      if (table.has(objNum)) continue;
      table.set(objNum, { offset: entryOffset.value, gen: gen.value, free: type.value !== 'n' });
    }
  }

  const trailer = extractTrailerInfo(readDict(lexer));
  return { table, trailer };
}

/**
 * Parse a cross-reference stream. The object at `offset` is a stream whose
 * dictionary doubles as the trailer.
 */
export function parseXRefStream(
  lexer: PdfLexer,
  offset: number,
  decode: (data: Uint8Array, dict: PdfDict) => Uint8Array,
  resolveLength: (dict: PdfDict) => number | undefined,
): XRefSection {
  lexer.position = offset;
  const objNum = lexer.nextToken();
  const gen = lexer.nextToken();
  const obj = lexer.nextToken();
  if (objNum.type !== 'number' || gen.type !== 'number' || obj.type !== 'keyword' || obj.value !== 'obj') {
    throw new StructuralError(`Expected 'obj' at xref stream offset ${offset}`, offset);
  }

  const dict = readDict(lexer);
  const streamKeyword = lexer.nextToken();
  if (streamKeyword.type !== 'keyword' || streamKeyword.value !== 'stream') {
    throw new StructuralError('Expected stream keyword in xref stream', streamKeyword.offset);
  }
  skipStreamEol(lexer);

  const length = dictGetNumber(dict, 'Length') ?? resolveLength(dict) ?? 0;
  const decoded = decode(lexer.slice(lexer.position, lexer.position + length), dict);

  const wObj = dictGet(dict, 'W');
  if (!wObj || !isArray(wObj) || wObj.items.length < 3) {
    throw new StructuralError('Missing or short /W array in xref stream');
  }
  const w = wObj.items.map(item => (isNumber(item) ? item.value : 0));

  const size = dictGetNumber(dict, 'Size') ?? 0;
  const indexObj = dictGet(dict, 'Index');
  const index = indexObj && isArray(indexObj)
    ? indexObj.items.map(item => (isNumber(item) ? item.value : 0))
    : [0, size];

  const table: XRefTable = new Map();
  const entrySize = w[0] + w[1] + w[2];
  let pos = 0;

  for (let i = 0; i + 1 < index.length; i += 2) {
    const first = index[i];
    const count = index[i + 1];

    for (let j = 0; j < count && pos + entrySize <= decoded.length; j++) {
      // A zero-width type field means every entry is type 1
      const type = w[0] === 0 ? 1 : readField(decoded, pos, w[0]);
      const field2 = readField(decoded, pos + w[0], w[1]);
      const field3 = readField(decoded, pos + w[0] + w[1], w[2]);
      pos += entrySize;

      const num = first + j;
      if (table.has(num)) continue;

      if (type === 0) {
        table.set(num, { offset: 0, gen: field3, free: true });
      } else if (type === 1) {
        table.set(num, { offset: field2, gen: field3, free: false });
      } else if (type === 2) {
        table.set(num, { offset: 0, gen: 0, free: false, streamObjNum: field2, streamIndex: field3 });
      }
    }
  }

  return { table, trailer: extractTrailerInfo(dict) };
}

/** Skip the single end-of-line marker that follows the `stream` keyword. */
export function skipStreamEol(lexer: PdfLexer): void {
  if (lexer.peek() === 0x0d) lexer.read();
  if (lexer.peek() === 0x0a) lexer.read();
}

function readField(data: Uint8Array, offset: number, width: number): number {
  let value = 0;
  for (let i = 0; i < width; i++) {
    value = value * 256 + (data[offset + i] ?? 0);
  }
  return value;
}

function extractTrailerInfo(dict: PdfDict): TrailerInfo {
  return {
    size: dictGetNumber(dict, 'Size') ?? 0,
    root: dictGetRef(dict, 'Root'),
    info: dictGetRef(dict, 'Info'),
    prev: dictGetNumber(dict, 'Prev'),
    dict,
  };
}

/**
 * Rebuild the xref by scanning the whole file for `N G obj` headers, then
 * find a trailer (or an xref stream dictionary) that names the catalog.
 * Later definitions of an object number replace earlier ones, as an
 * incremental update would.
 */
export function scanForObjects(lexer: PdfLexer): XRefSection {
  const table: XRefTable = new Map();

  for (let at = lexer.findNext(OBJ_MARKER, 0); at !== -1; at = lexer.findNext(OBJ_MARKER, at + OBJ_MARKER.length)) {
    const header = parseObjHeader(lexer, at);
    if (header) {
      table.set(header.objNum, { offset: header.start, gen: header.gen, free: false });
    }
  }

  let trailer: TrailerInfo | null = null;
  for (let at = lexer.findNext(TRAILER_MARKER, 0); at !== -1; at = lexer.findNext(TRAILER_MARKER, at + TRAILER_MARKER.length)) {
    lexer.position = at + TRAILER_MARKER.length;
    let candidate: TrailerInfo;
    try {
      candidate = extractTrailerInfo(readDict(lexer));
    } catch {
      continue; // not a trailer dictionary; keep looking
    }
    if (candidate.root || !trailer) trailer = candidate;
  }

  if (!trailer?.root) {
    for (const entry of table.values()) {
      lexer.position = entry.offset;
      lexer.nextToken();
      lexer.nextToken();
      lexer.nextToken();
      lexer.skipWhitespaceAndComments();
      if (lexer.peek() !== 0x3c) continue;

      let dict: PdfDict;
      try {
        dict = readDict(lexer);
      } catch {
        continue; // hex string or broken object
      }
      if (dictGetName(dict, 'Type') === 'XRef' || dictGetRef(dict, 'Root')) {
        const candidate = extractTrailerInfo(dict);
        if (candidate.root) {
          trailer = candidate;
          break;
        }
      }
    }
  }

  if (!trailer) {
    throw new StructuralError('Could not recover PDF structure: no trailer found during full scan');
  }

  return { table, trailer };
}

/**
 * Read "objNum gen" backward from the space of a " obj" marker.
 * Returns null when the preceding bytes are not two unsigned integers.
 */
function parseObjHeader(
  lexer: PdfLexer,
  markerPos: number,
): { objNum: number; gen: number; start: number } | null {
  const windowStart = Math.max(0, markerPos - 32);
  const before = String.fromCharCode(...lexer.slice(windowStart, markerPos));
  const match = /(?:^|[\s\x00])(\d+)[\s\x00]+(\d+)[\s\x00]*$/.exec(before);
  if (!match) return null;

  const digitsAt = match.index + match[0].indexOf(match[1]);
  // A match at the window edge may be the tail of a longer number
  if (digitsAt === 0 && windowStart > 0) return null;

  return { objNum: parseInt(match[1], 10), gen: parseInt(match[2], 10), start: windowStart + digitsAt };
}
