import { describe, it, expect } from 'vitest';
import { PdfDocument } from '../../src/document.js';
import { inspectPdf, sanitizePdf } from '../../src/api.js';
import { StructuralError } from '../../src/errors.js';
import { applyPngPredictor, flateDecode } from '../../src/stream/filters.js';
import { buildDocument, JS_ACTION } from '../helpers/pdf-builder.js';

describe('circular reference protection', () => {
  it('returns null for a reference loop between objects', () => {
    const doc = PdfDocument.fromBuffer(buildDocument({ objects: { 6: '7 0 R', 7: '6 0 R' } }));
    expect(doc.resolve(doc.getObject(6))).toEqual({ kind: 'null' });
    doc.dispose();
  });

  it('walks a self-referencing catalog without looping', () => {
    const data = buildDocument({ catalog: '/Self 1 0 R /Loop [1 0 R 2 0 R]' });
    expect(inspectPdf(data)).toBeNull();
    expect(sanitizePdf(data).report.passes).toBe(1);
  });

  it('treats an open action that loops back on itself as harmless', () => {
    expect(inspectPdf(buildDocument({ catalog: '/OpenAction 6 0 R', objects: { 6: '7 0 R', 7: '6 0 R' } }))).toBeNull();
  });

  it('finds JavaScript behind a shared object only once per pass', () => {
    const data = buildDocument({
      catalog: '/Extra [8 0 R 8 0 R]',
      objects: { 6: JS_ACTION, 8: '<< /Kind /Holder /A 6 0 R /Up 8 0 R >>' },
    });
    const { bytes, report } = sanitizePdf(data);
    expect(report).toEqual({ changed: true, reachedLimit: false, passes: 2 });
    expect(inspectPdf(bytes)).toBeNull();
  });
});

describe('disposed documents', () => {
  it('throw StructuralError on use', () => {
    const doc = PdfDocument.fromBuffer(buildDocument());
    doc.dispose();
    expect(() => doc.catalog).toThrow(StructuralError);
    expect(() => doc.save()).toThrow('Document has been disposed');
  });
});

describe('PNG predictor zero columns guard', () => {
  it('returns data unmodified when columns is 0', () => {
    const data = new Uint8Array([0, 1, 2, 3, 4, 5]);
    expect(applyPngPredictor(data, 0)).toEqual(data);
  });

  it('returns data unmodified when columns is negative', () => {
    const data = new Uint8Array([0, 1, 2, 3]);
    expect(applyPngPredictor(data, -1)).toEqual(data);
  });
});

describe('flate decode failure', () => {
  it('throws StructuralError on completely invalid data', () => {
    const garbage = new Uint8Array([0xFF, 0xFE, 0xFD, 0xFC, 0xFB]);
    expect(() => flateDecode(garbage)).toThrow(StructuralError);
    expect(() => flateDecode(garbage)).toThrow('FlateDecode decompression failed');
  });
});
