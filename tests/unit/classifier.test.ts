import { describe, it, expect } from 'vitest';
import { isJavaScriptAction } from '../../src/actions/classifier.js';
import { PDF_NULL, pdfNumber, pdfRef, pdfStream, pdfStringFromText } from '../../src/parser/types.js';
import { MemoryGraph, arr, dict, jsAction, name, uriAction } from '../helpers/memory-graph.js';

describe('isJavaScriptAction', () => {
  const graph = new MemoryGraph();

  it('accepts a dictionary whose /S is /JavaScript', () => {
    expect(isJavaScriptAction(jsAction(), graph)).toBe(true);
  });

  it('rejects other action types', () => {
    expect(isJavaScriptAction(uriAction(), graph)).toBe(false);
    expect(isJavaScriptAction(dict({ JS: pdfStringFromText('app.alert(1)') }), graph)).toBe(false);
  });

  it('requires /S to be a name, not a string', () => {
    expect(isJavaScriptAction(dict({ S: pdfStringFromText('JavaScript') }), graph)).toBe(false);
  });

  it('follows a reference to the action and to its /S value', () => {
    const g = new MemoryGraph();
    const subtype = g.add(2, name('JavaScript'));
    const action = g.add(1, dict({ S: subtype }));
    expect(isJavaScriptAction(action, g)).toBe(true);
  });

  it('accepts an array with a JavaScript action at any depth', () => {
    const g = new MemoryGraph();
    const nested = g.add(4, arr(uriAction(), jsAction()));
    expect(isJavaScriptAction(arr(uriAction(), arr(pdfNumber(1), nested)), g)).toBe(true);
    expect(isJavaScriptAction(arr(uriAction(), arr()), g)).toBe(false);
  });

  it('treats a stream dictionary like a dictionary', () => {
    const stream = pdfStream(jsAction(), new Uint8Array(0));
    expect(isJavaScriptAction(stream, graph)).toBe(true);
  });

  it('returns false for scalars, null and dangling references', () => {
    expect(isJavaScriptAction(name('JavaScript'), graph)).toBe(false);
    expect(isJavaScriptAction(pdfNumber(3), graph)).toBe(false);
    expect(isJavaScriptAction(PDF_NULL, graph)).toBe(false);
    expect(isJavaScriptAction(pdfRef(99, 0), graph)).toBe(false);
  });

  it('terminates on an array that contains itself', () => {
    const g = new MemoryGraph();
    const self = arr(uriAction());
    const ref = g.add(7, self);
    self.items.push(ref);
    expect(isJavaScriptAction(ref, g)).toBe(false);
  });
});
