import { describe, it, expect } from 'vitest';
import { PdfParser } from '../../src/parser/parser.js';
import { PdfLexer } from '../../src/parser/lexer.js';
import { readObject, readDict } from '../../src/parser/objects.js';
import { StructuralError } from '../../src/errors.js';
import {
  dictGetName, isDict, isStream, pdfArray, pdfName, pdfNumber, pdfRef, PDF_NULL,
} from '../../src/parser/types.js';
import { PdfBuilder, documentBuilder, buildDocument, latin1 } from '../helpers/pdf-builder.js';

function parse(data: Uint8Array): PdfParser {
  const parser = new PdfParser(data);
  parser.parse();
  return parser;
}

describe('readObject', () => {
  const read = (text: string) => readObject(new PdfLexer(latin1(text)));

  it('reads indirect references and leaves plain numbers alone', () => {
    expect(read('12 0 R')).toEqual(pdfRef(12, 0));
    expect(read('[1 2 0 R 4]')).toEqual(pdfArray([pdfNumber(1), pdfRef(2, 0), pdfNumber(4)]));
  });

  it('reads nested dictionaries in key order', () => {
    const obj = read('<< /S /JavaScript /Inner << /N [/a] >> /Last null >>');
    if (!isDict(obj)) throw new Error('expected a dictionary');
    expect([...obj.entries.keys()]).toEqual(['S', 'Inner', 'Last']);
    expect(obj.entries.get('S')).toEqual(pdfName('JavaScript'));
    expect(obj.entries.get('Last')).toEqual(PDF_NULL);
  });

  it('stops an unterminated array at endobj', () => {
    const lexer = new PdfLexer(latin1('[1 2 endobj'));
    expect(readObject(lexer)).toEqual(pdfArray([pdfNumber(1), pdfNumber(2)]));
    expect(lexer.nextToken()).toEqual({ type: 'keyword', value: 'endobj', offset: 5 });
  });

  it('drops a key whose value is missing', () => {
    const obj = read('<< /A 1 /B >>');
    if (!isDict(obj)) throw new Error('expected a dictionary');
    expect([...obj.entries.keys()]).toEqual(['A']);
  });

  it('requires << for readDict', () => {
    expect(() => readDict(new PdfLexer(latin1('[1]')))).toThrow(StructuralError);
  });
});

describe('PdfParser', () => {
  it('reads the trailer and catalog', () => {
    const parser = parse(buildDocument());
    expect(parser.getTrailer().root).toEqual(pdfRef(1, 0));
    expect(dictGetName(parser.getCatalog(), 'Type')).toBe('Catalog');
    expect(parser.wasRecovered).toBe(false);
    expect(parser.isEncrypted).toBe(false);
  });

  it('returns page references in document order through nested page trees', () => {
    const builder = new PdfBuilder()
      .addObject(1, '<< /Type /Catalog /Pages 2 0 R >>')
      .addObject(2, '<< /Type /Pages /Kids [3 0 R 4 0 R] /Count 3 >>')
      .addObject(3, '<< /Type /Pages /Parent 2 0 R /Kids [5 0 R 6 0 R] /Count 2 >>')
      .addObject(4, '<< /Type /Page /Parent 2 0 R >>')
      .addObject(5, '<< /Type /Page /Parent 3 0 R >>')
      .addObject(6, '<< /Type /Page /Parent 3 0 R >>');
    expect(parse(builder.build()).getPageRefs()).toEqual([pdfRef(5, 0), pdfRef(6, 0), pdfRef(4, 0)]);
  });

  it('stops at a page tree that lists itself as a kid', () => {
    const builder = new PdfBuilder()
      .addObject(1, '<< /Type /Catalog /Pages 2 0 R >>')
      .addObject(2, '<< /Type /Pages /Kids [2 0 R 3 0 R] /Count 1 >>')
      .addObject(3, '<< /Type /Page /Parent 2 0 R >>');
    expect(parse(builder.build()).getPageRefs()).toEqual([pdfRef(3, 0)]);
  });

  it('returns the same node for every lookup of an object', () => {
    const parser = parse(buildDocument());
    const first = parser.getObject(3, 0);
    expect(parser.resolve(pdfRef(3, 0))).toBe(first);
    expect(parser.getObject(3, 0)).toBe(first);
  });

  it('resolves missing objects to null', () => {
    expect(parse(buildDocument()).resolve(pdfRef(42, 0))).toEqual(PDF_NULL);
  });

  it('reads a stream with an indirect /Length', () => {
    const data = documentBuilder({ page: '/Thumb 7 0 R', objects: { 6: '5' } })
      .addObject(7, '<< /Length 6 0 R >>\nstream\nabcde\nendstream')
      .build();
    const thumb = parse(data).getObject(7);
    if (!isStream(thumb)) throw new Error('expected a stream');
    expect(new TextDecoder().decode(thumb.data)).toBe('abcde');
  });

  it('falls back to endstream when /Length is wrong', () => {
    const data = documentBuilder({ objects: { 7: '<< /Length 99999 >>\nstream\nabc\r\nendstream' } }).build();
    const stream = parse(data).getObject(7);
    if (!isStream(stream)) throw new Error('expected a stream');
    expect(new TextDecoder().decode(stream.data)).toBe('abc');
  });

  it('reads objects from an object stream indexed by an xref stream', () => {
    const members = ['<< /S /JavaScript /JS (x) >>', '[1 2 3]'];
    const header = `6 0 7 ${members[0].length + 1} `;
    const data = documentBuilder({ catalog: '/OpenAction 6 0 R /Extra 7 0 R' })
      .addStream(8, `/Type /ObjStm /N 2 /First ${header.length}`, header + members.join(' '))
      .addCompressed(6, 8, 0)
      .addCompressed(7, 8, 1)
      .build({ xrefStream: true, version: '1.5' });

    const parser = parse(data);
    const action = parser.getObject(6);
    if (!isDict(action)) throw new Error('expected a dictionary');
    expect(dictGetName(action, 'S')).toBe('JavaScript');
    expect(parser.getObject(7)).toEqual(pdfArray([pdfNumber(1), pdfNumber(2), pdfNumber(3)]));
  });

  it('raises the header version with a catalog /Version', () => {
    expect(parse(buildDocument()).version).toBe('1.4');
    expect(parse(buildDocument({ catalog: '/Version /1.7' })).version).toBe('1.7');
    expect(parse(new PdfBuilder()
      .addObject(1, '<< /Type /Catalog /Pages 2 0 R /Version /1.3 >>')
      .addObject(2, '<< /Type /Pages /Kids [] /Count 0 >>')
      .build({ version: '1.6' })).version).toBe('1.6');
  });

  it('exposes the stream dictionary of the content stream', () => {
    const content = parse(buildDocument()).getObject(4);
    expect(isStream(content) && content.dict.entries.get('Length')).toEqual(pdfNumber(43));
  });
});
