/**
 * Recursive-descent reader for direct PDF objects. Shared by the xref reader
 * (trailers, xref stream dictionaries) and the indirect object parser.
 */

import { PdfLexer } from './lexer.js';
import type { Token } from './lexer.js';
import type { PdfDict, PdfObject } from './types.js';
import { pdfRef, pdfName, pdfNumber, pdfArray, pdfString, pdfBool, pdfDict, PDF_NULL } from './types.js';
import { StructuralError } from '../errors.js';

/** Read one object starting at the lexer's position */
export function readObject(lexer: PdfLexer): PdfObject {
  return readFrom(lexer, lexer.nextToken());
}

/** Read a dictionary; throws if the next token is not `<<` */
export function readDict(lexer: PdfLexer): PdfDict {
  const token = lexer.nextToken();
  if (token.type !== 'dictStart') {
    throw new StructuralError(`Expected << but got ${token.type}`, token.offset);
  }
  return readDictBody(lexer);
}

/** Keywords that end an object body; an unterminated array or dictionary stops at them */
function isObjectTerminator(token: Token): boolean {
  return token.type === 'keyword' && (token.value === 'endobj' || token.value === 'stream');
}

function readFrom(lexer: PdfLexer, token: Token): PdfObject {
  switch (token.type) {
    case 'number': {
      const afterNumber = lexer.position;
      const gen = lexer.nextToken();
      if (gen.type === 'number' && Number.isInteger(token.value) && Number.isInteger(gen.value)) {
        const r = lexer.nextToken();
        if (r.type === 'keyword' && r.value === 'R') {
          return pdfRef(token.value, gen.value);
        }
      }
      lexer.position = afterNumber;
      return pdfNumber(token.value);
    }
    case 'string':
    case 'hexstring':
      return pdfString(token.value);
    case 'name':
      return pdfName(token.value);
    case 'bool':
      return pdfBool(token.value);
    case 'dictStart':
      return readDictBody(lexer);
    case 'arrayStart': {
      const items: PdfObject[] = [];
      for (;;) {
        const next = lexer.nextToken();
        if (next.type === 'arrayEnd' || next.type === 'eof') break;
        if (isObjectTerminator(next)) {
          lexer.position = next.offset;
          break;
        }
        items.push(readFrom(lexer, next));
      }
      return pdfArray(items);
    }
    default:
      return PDF_NULL;
  }
}

function readDictBody(lexer: PdfLexer): PdfDict {
  const entries = new Map<string, PdfObject>();
  for (;;) {
    const key = lexer.nextToken();
    if (key.type === 'dictEnd' || key.type === 'eof') break;
    if (isObjectTerminator(key)) {
      lexer.position = key.offset;
      break;
    }
    if (key.type !== 'name') continue;

    const valueToken = lexer.nextToken();
    if (valueToken.type === 'dictEnd' || valueToken.type === 'eof') break;
    entries.set(key.value, readFrom(lexer, valueToken));
  }
  return pdfDict(entries);
}
