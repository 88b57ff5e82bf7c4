import { describe, it, expect } from 'vitest';
import { PdfDocument } from '../../src/document.js';
import { inspectPdf, sanitizePdf } from '../../src/api.js';
import { PasswordProtectedError } from '../../src/errors.js';
import { isDict, isStream, pdfString } from '../../src/parser/types.js';
import { encryptedDocument, latin1, PAGE_TEXT } from '../helpers/pdf-builder.js';

describe('encrypted PDF with empty user password', () => {
  it('decrypts strings and streams', () => {
    const doc = PdfDocument.fromBuffer(encryptedDocument());
    expect(doc.isEncrypted).toBe(true);

    const action = doc.getObject(6);
    if (!isDict(action)) throw new Error('expected a dictionary');
    expect(action.entries.get('JS')).toEqual(pdfString(latin1('app.alert(1)')));

    const content = doc.getObject(4);
    if (!isStream(content)) throw new Error('expected a stream');
    expect(String.fromCharCode(...content.data)).toBe(PAGE_TEXT);
  });

  it('detects the open action', () => {
    expect(inspectPdf(encryptedDocument())?.location).toBe('/Root/OpenAction');
  });

  it('writes the sanitized copy without encryption', () => {
    const { bytes, report } = sanitizePdf(encryptedDocument());
    expect(report.changed).toBe(true);

    const output = String.fromCharCode(...bytes);
    expect(output).not.toContain('/Encrypt');
    expect(output).toContain(PAGE_TEXT);

    const reopened = PdfDocument.fromBuffer(bytes);
    expect(reopened.isEncrypted).toBe(false);
    expect(inspectPdf(bytes)).toBeNull();
  });
});

describe('password-protected PDF', () => {
  it('throws PasswordProtectedError without the password', () => {
    const data = encryptedDocument('secret');
    expect(() => PdfDocument.fromBuffer(data)).toThrow(PasswordProtectedError);
    expect(() => PdfDocument.fromBuffer(data)).toThrow('Encrypted PDF requires a password');
  });

  it('opens with the user password', () => {
    const doc = PdfDocument.fromBuffer(encryptedDocument('secret'), { password: 'secret' });
    expect(doc.pageCount).toBe(1);
  });

  it('reports other security handlers as password protected', () => {
    expect(() => PdfDocument.fromBuffer(encryptedDocument('', 'Adobe.PubSec')))
      .toThrow('Encrypted PDF: unsupported security handler');
  });
});
