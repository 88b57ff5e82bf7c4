/**
 * Test PDF builder.
 * Assembles small PDFs in memory with correctly computed xref offsets.
 */

import { createHash } from 'node:crypto';
import { padPassword, rc4 } from '../../src/crypto/security-handler.js';

/** One byte per char code; test content is ASCII or deliberate binary */
export function latin1(text: string): Uint8Array {
  return Uint8Array.from(text, ch => ch.charCodeAt(0) & 0xff);
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let at = 0;
  for (const part of parts) {
    out.set(part, at);
    at += part.length;
  }
  return out;
}

interface BuilderObject {
  readonly num: number;
  readonly gen: number;
  readonly body: Uint8Array;
}

interface CompressedEntry {
  readonly streamObjNum: number;
  readonly index: number;
}

export interface BuildOptions {
  /** Header version. Default: '1.4' */
  readonly version?: string;
  /** Write a cross-reference stream instead of a classic table */
  readonly xrefStream?: boolean;
  /** Leave out the xref table and startxref, forcing the recovery scan */
  readonly omitXRef?: boolean;
}

export class PdfBuilder {
  private readonly objects: BuilderObject[] = [];
  private readonly compressed = new Map<number, CompressedEntry>();
  private trailerExtra = '';

  addObject(num: number, content: string, gen = 0): this {
    this.objects.push({ num, gen, body: latin1(content) });
    return this;
  }

  /** `dict` holds the dictionary entries without << >>; /Length is added. */
  addStream(num: number, dict: string, data: string | Uint8Array, gen = 0): this {
    const bytes = typeof data === 'string' ? latin1(data) : data;
    const entries = dict ? `${dict} ` : '';
    this.objects.push({
      num,
      gen,
      body: concat([
        latin1(`<< ${entries}/Length ${bytes.length} >>\nstream\n`),
        bytes,
        latin1('\nendstream'),
      ]),
    });
    return this;
  }

  /** Declare `num` as member `index` of object stream `streamObjNum` (xrefStream builds only). */
  addCompressed(num: number, streamObjNum: number, index: number): this {
    this.compressed.set(num, { streamObjNum, index });
    return this;
  }

  /** Extra trailer entries, e.g. `/Info 9 0 R` */
  setTrailer(extra: string): this {
    this.trailerExtra = extra;
    return this;
  }

  build(options: BuildOptions = {}): Uint8Array {
    const parts: Uint8Array[] = [latin1(`%PDF-${options.version ?? '1.4'}\n`)];
    const offsets = new Map<number, { offset: number; gen: number }>();
    let offset = parts[0].length;

    for (const obj of this.objects) {
      offsets.set(obj.num, { offset, gen: obj.gen });
      const chunk = concat([latin1(`${obj.num} ${obj.gen} obj\n`), obj.body, latin1('\nendobj\n\n')]);
      parts.push(chunk);
      offset += chunk.length;
    }

    const trailerEntries = `/Root 1 0 R${this.trailerExtra ? ` ${this.trailerExtra}` : ''}`;
    const maxObj = Math.max(0, ...offsets.keys(), ...this.compressed.keys());

    if (options.omitXRef) {
      parts.push(latin1(`trailer\n<< /Size ${maxObj + 1} ${trailerEntries} >>\n%%EOF\n`));
    } else if (options.xrefStream) {
      parts.push(this.xrefStream(offsets, maxObj + 1, offset, trailerEntries));
    } else {
      const lines = ['xref\n', `0 ${maxObj + 1}\n`, '0000000000 65535 f \r\n'];
      for (let i = 1; i <= maxObj; i++) {
        const entry = offsets.get(i);
        lines.push(entry
          ? `${String(entry.offset).padStart(10, '0')} ${String(entry.gen).padStart(5, '0')} n \r\n`
          : '0000000000 65535 f \r\n');
      }
      parts.push(latin1(lines.join('')));
      parts.push(latin1(`trailer\n<< /Size ${maxObj + 1} ${trailerEntries} >>\nstartxref\n${offset}\n%%EOF\n`));
    }

    return concat(parts);
  }

  /** Cross-reference stream as the next object number, /W [1 4 2], ASCIIHex encoded */
  private xrefStream(
    offsets: Map<number, { offset: number; gen: number }>,
    size: number,
    at: number,
    trailerEntries: string,
  ): Uint8Array {
    const xrefNum = size;
    const rows: number[][] = [];
    for (let num = 0; num <= xrefNum; num++) {
      const direct = num === xrefNum ? { offset: at, gen: 0 } : offsets.get(num);
      const packed = this.compressed.get(num);
      if (direct) rows.push([1, direct.offset, direct.gen]);
      else if (packed) rows.push([2, packed.streamObjNum, packed.index]);
      else rows.push([0, 0, num === 0 ? 0xffff : 0]);
    }

    const data = new Uint8Array(rows.length * 7);
    rows.forEach(([type, field2, field3], i) => {
      const base = i * 7;
      data[base] = type;
      data[base + 1] = (field2 >>> 24) & 0xff;
      data[base + 2] = (field2 >>> 16) & 0xff;
      data[base + 3] = (field2 >>> 8) & 0xff;
      data[base + 4] = field2 & 0xff;
      data[base + 5] = (field3 >>> 8) & 0xff;
      data[base + 6] = field3 & 0xff;
    });
    const hex = `${toHex(data)}>`;

    return latin1(
      `${xrefNum} 0 obj\n<< /Type /XRef /Size ${xrefNum + 1} /W [1 4 2] ${trailerEntries}` +
      ` /Filter /ASCIIHexDecode /Length ${hex.length} >>\nstream\n${hex}\nendstream\nendobj\n` +
      `startxref\n${at}\n%%EOF\n`,
    );
  }
}

// ─── Document skeletons ───

/** A JavaScript action dictionary, as written inside an object */
export const JS_ACTION = '<< /Type /Action /S /JavaScript /JS (app.alert(1)) >>';

/** A harmless URI action */
export const URI_ACTION = '<< /Type /Action /S /URI /URI (https://example.com/) >>';

export const PAGE_TEXT = 'BT\n/F1 12 Tf\n100 700 Td\n(Hello World) Tj\nET';

export interface DocumentParts {
  /** Extra catalog entries */
  readonly catalog?: string;
  /** Extra entries for the single page (object 3) */
  readonly page?: string;
  /** Additional objects, numbered from 6 upward by convention */
  readonly objects?: Readonly<Record<number, string>>;
}

/**
 * One-page document: 1 catalog, 2 page tree, 3 page, 4 content stream,
 * 5 font, plus whatever `parts.objects` adds.
 */
export function documentBuilder(parts: DocumentParts = {}): PdfBuilder {
  const builder = new PdfBuilder();
  builder.addObject(1, `<< /Type /Catalog /Pages 2 0 R${parts.catalog ? ` ${parts.catalog}` : ''} >>`);
  builder.addObject(2, '<< /Type /Pages /Kids [3 0 R] /Count 1 >>');
  builder.addObject(3,
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R' +
    ` /Resources << /Font << /F1 5 0 R >> >>${parts.page ? ` ${parts.page}` : ''} >>`);
  builder.addStream(4, '', PAGE_TEXT);
  builder.addObject(5, '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>');
  for (const [num, content] of Object.entries(parts.objects ?? {})) {
    builder.addObject(Number(num), content);
  }
  return builder;
}

export function buildDocument(parts: DocumentParts = {}): Uint8Array {
  return documentBuilder(parts).build();
}

// ─── Encryption (standard security handler, revision 2, RC4-40) ───

export const FILE_ID = latin1('0123456789abcdef');

const PERMISSIONS = -4;

function md5(...parts: Uint8Array[]): Uint8Array {
  const hash = createHash('md5');
  for (const part of parts) hash.update(part);
  return new Uint8Array(hash.digest());
}

function int32LE(n: number): Uint8Array {
  return new Uint8Array([n & 0xff, (n >>> 8) & 0xff, (n >>> 16) & 0xff, (n >>> 24) & 0xff]);
}

/**
 * Encrypts strings and streams the way a revision 2 writer would for the
 * given user password.
 */
export class Rc4Encryptor {
  readonly owner = padPassword('owner');
  readonly key: Uint8Array;
  readonly user: Uint8Array;

  constructor(password = '') {
    this.key = md5(padPassword(password), this.owner, int32LE(PERMISSIONS), FILE_ID).slice(0, 5);
    this.user = rc4(this.key, padPassword(''));
  }

  encrypt(data: Uint8Array, objNum: number, gen = 0): Uint8Array {
    const objectKey = md5(
      this.key,
      new Uint8Array([objNum & 0xff, (objNum >> 8) & 0xff, (objNum >> 16) & 0xff, gen & 0xff, (gen >> 8) & 0xff]),
    ).subarray(0, 10);
    return rc4(objectKey, data);
  }

  /** Hex string operand for text owned by object `objNum` */
  string(text: string, objNum: number): string {
    return `<${toHex(this.encrypt(latin1(text), objNum))}>`;
  }

  encryptDict(): string {
    return `<< /Filter /Standard /V 1 /R 2 /O <${toHex(this.owner)}> /U <${toHex(this.user)}> /P ${PERMISSIONS} >>`;
  }

  trailer(encryptObjNum: number): string {
    return `/Encrypt ${encryptObjNum} 0 R /ID [<${toHex(FILE_ID)}> <${toHex(FILE_ID)}>]`;
  }
}

/** One page with a JavaScript open action, encrypted for `password` */
export function encryptedDocument(password = '', filter = 'Standard'): Uint8Array {
  const enc = new Rc4Encryptor(password);
  return new PdfBuilder()
    .addObject(1, '<< /Type /Catalog /Pages 2 0 R /OpenAction 6 0 R >>')
    .addObject(2, '<< /Type /Pages /Kids [3 0 R] /Count 1 >>')
    .addObject(3, '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R >>')
    .addStream(4, '', enc.encrypt(latin1(PAGE_TEXT), 4))
    .addObject(6, `<< /S /JavaScript /JS ${enc.string('app.alert(1)', 6)} >>`)
    .addObject(9, enc.encryptDict().replace('/Standard', `/${filter}`))
    .setTrailer(enc.trailer(9))
    .build();
}
