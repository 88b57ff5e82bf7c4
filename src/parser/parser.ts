/**
 * PDF Object Parser
 *
 * - Reads the xref chain and trailer, falling back to a full scan
 * - Resolves indirect references lazily, caching each object so that one
 *   object number always yields the same (mutable) node
 * - Reads objects stored in object streams (PDF 1.5+)
 * - Decrypts strings and streams of documents protected by the standard
 *   security handler
 */

import { PdfLexer } from './lexer.js';
import { readObject } from './objects.js';
import { StructuralError, PasswordProtectedError } from '../errors.js';
import type { PdfObject, PdfDict, PdfStream, PdfArray, XRefTable, TrailerInfo } from './types.js';
import {
  pdfDict, pdfArray, pdfString, pdfStream, PDF_NULL,
  isRef, isDict, isStream, isNumber, isArray, isString, asDict,
  dictGet, dictGetNumber, dictGetName,
} from './types.js';
import { findStartXRef, parseXRefTable, parseXRefStream, scanForObjects, skipStreamEol } from './xref.js';
import type { XRefSection } from './xref.js';
import { decodeStream } from '../stream/decoder.js';
import { StandardSecurityHandler } from '../crypto/security-handler.js';

const ENDSTREAM_MARKER = new TextEncoder().encode('endstream');
const HEADER_PATTERN = /%PDF-(\d\.\d)/;

export interface ParserOptions {
  /** User password for encrypted documents. Default: '' */
  readonly password?: string;
}

interface ObjectStreamIndex {
  readonly data: Uint8Array;
  readonly offsets: number[];
}

export class PdfParser {
  private readonly lexer: PdfLexer;
  private readonly xref: XRefTable = new Map();
  private readonly objectCache = new Map<string, PdfObject>();
  private readonly objectStreams = new Map<number, ObjectStreamIndex>();
  private readonly inProgress = new Set<number>();
  private trailer: TrailerInfo | null = null;
  private security: StandardSecurityHandler | null = null;
  private recovered = false;

  constructor(data: Uint8Array, private readonly options: ParserOptions = {}) {
    this.lexer = new PdfLexer(data);
  }

  /** Read the xref chain and trailer, then unlock encryption if present. */
  parse(): void {
    try {
      this.readXRefChain(findStartXRef(this.lexer), new Set());
    } catch {
      // Unusable xref: rebuild it from the object headers in the file
      this.xref.clear();
      const recovery = scanForObjects(this.lexer);
      this.mergeXRef(recovery.table);
      this.trailer = recovery.trailer;
      this.recovered = true;
    }

    if (!this.trailer?.root) {
      throw new StructuralError('Trailer missing /Root entry');
    }

    const encrypt = dictGet(this.trailer.dict, 'Encrypt');
    if (encrypt) {
      const encryptDict = asDict(this.resolve(encrypt));
      if (!encryptDict) {
        throw new PasswordProtectedError('Encrypted PDF: cannot read encryption dictionary');
      }
      const ids = dictGet(this.trailer.dict, 'ID');
      const idArray = ids ? this.resolve(ids) : PDF_NULL;
      const firstId = isArray(idArray) ? idArray.items[0] : undefined;
      if (!firstId || !isString(firstId)) {
        throw new PasswordProtectedError('Encrypted PDF: missing file ID');
      }
      this.security = StandardSecurityHandler.open(encryptDict, firstId.value, this.options.password);
    }
  }

  getTrailer(): TrailerInfo {
    if (!this.trailer) throw new StructuralError('Document has not been parsed');
    return this.trailer;
  }

  /** True when the document was opened through the full-scan fallback */
  get wasRecovered(): boolean {
    return this.recovered;
  }

  get isEncrypted(): boolean {
    return this.security !== null;
  }

  /** Header version (e.g. "1.7"), raised by a catalog /Version entry */
  get version(): string {
    const header = HEADER_PATTERN.exec(String.fromCharCode(...this.lexer.slice(0, 1024)));
    const headerVersion = header ? header[1] : '1.7';
    const catalogVersion = dictGetName(this.getCatalog(), 'Version');
    return catalogVersion && /^\d\.\d$/.test(catalogVersion) && catalogVersion > headerVersion
      ? catalogVersion
      : headerVersion;
  }

  /** Follow indirect references until a direct object (or null) is reached. */
  resolve(obj: PdfObject): PdfObject {
    let current = obj;
    for (let hops = 0; isRef(current); hops++) {
      if (hops >= 32) return PDF_NULL;
      current = this.getObject(current.objNum, current.gen);
    }
    return current;
  }

  /** Parse (once) and return indirect object `objNum`; free or missing objects are null. */
  getObject(objNum: number, gen = 0): PdfObject {
    const cacheKey = `${objNum}:${gen}`;
    const cached = this.objectCache.get(cacheKey);
    if (cached) return cached;

    const entry = this.xref.get(objNum);
    if (!entry || entry.free || this.inProgress.has(objNum)) return PDF_NULL;

    this.inProgress.add(objNum);
    let obj: PdfObject;
    try {
      if (entry.streamObjNum !== undefined) {
        obj = this.getCompressedObject(entry.streamObjNum, entry.streamIndex ?? 0);
      } else {
        obj = this.parseObjectAt(entry.offset);
        if (this.security) obj = this.decryptObject(obj, objNum, gen);
      }
    } finally {
      this.inProgress.delete(objNum);
    }

    this.objectCache.set(cacheKey, obj);
    return obj;
  }

  decodeStreamData(stream: PdfStream): Uint8Array {
    return decodeStream(stream.data, stream.dict, (obj) => this.resolve(obj));
  }

  getCatalog(): PdfDict {
    const root = this.resolve(this.getTrailer().root ?? PDF_NULL);
    if (!isDict(root)) {
      throw new StructuralError('Root catalog is not a dictionary');
    }
    return root;
  }

  /**
   * Page objects in document order, as they appear in their parent's /Kids
   * (normally references, so each page keeps its object identity).
   */
  getPageRefs(): PdfObject[] {
    const pagesRef = dictGet(this.getCatalog(), 'Pages');
    if (!pagesRef) throw new StructuralError('Catalog missing /Pages');

    const pages: PdfObject[] = [];
    this.collectPages(pagesRef, pages, new Set());
    return pages;
  }

  // ─── Private ───

  private readXRefChain(offset: number, seen: Set<number>): void {
    if (seen.has(offset)) {
      throw new StructuralError(`Cyclic /Prev chain at offset ${offset}`, offset);
    }
    seen.add(offset);

    this.lexer.position = offset;
    const first = this.lexer.nextToken();

    let section: XRefSection;
    if (first.type === 'keyword' && first.value === 'xref') {
      section = parseXRefTable(this.lexer, offset);
    } else if (first.type === 'number') {
      section = parseXRefStream(
        this.lexer,
        offset,
        (data, dict) => decodeStream(data, dict),
        (dict) => this.readIndirectLength(dict),
      );
    } else {
      throw new StructuralError(`Unexpected token at xref offset ${offset}: ${first.type}`, offset);
    }

    this.mergeXRef(section.table);

    // The newest trailer wins, but an older one may be the only one naming /Root
    if (!this.trailer) {
      this.trailer = section.trailer;
    } else if (!this.trailer.root && section.trailer.root) {
      this.trailer = { ...this.trailer, root: section.trailer.root };
    }

    // Hybrid files keep their compressed objects in a side xref stream
    const xrefStm = dictGetNumber(section.trailer.dict, 'XRefStm');
    if (xrefStm !== undefined && !seen.has(xrefStm)) {
      seen.add(xrefStm);
      const hybrid = parseXRefStream(
        this.lexer,
        xrefStm,
        (data, dict) => decodeStream(data, dict),
        (dict) => this.readIndirectLength(dict),
      );
      this.mergeXRef(hybrid.table);
    }

    if (section.trailer.prev !== undefined) {
      this.readXRefChain(section.trailer.prev, seen);
    }
  }

  private mergeXRef(table: XRefTable): void {
    // Sections are read newest first, so an existing entry is never replaced
    for (const [objNum, entry] of table) {
      if (!this.xref.has(objNum)) this.xref.set(objNum, entry);
    }
  }

  private parseObjectAt(offset: number): PdfObject {
    this.lexer.position = offset;
    const num = this.lexer.nextToken();
    const gen = this.lexer.nextToken();
    const keyword = this.lexer.nextToken();
    if (num.type !== 'number' || gen.type !== 'number' || keyword.type !== 'keyword' || keyword.value !== 'obj') {
      throw new StructuralError(`No object header at offset ${offset}`, offset);
    }

    const obj = readObject(this.lexer);

    const afterValue = this.lexer.position;
    const next = this.lexer.nextToken();
    if (next.type !== 'keyword' || next.value !== 'stream' || !isDict(obj)) {
      this.lexer.position = afterValue;
      return obj;
    }

    skipStreamEol(this.lexer);
    const start = this.lexer.position;
    const length = this.streamLength(obj);
    if (length !== undefined && start + length <= this.lexer.length) {
      return pdfStream(obj, this.lexer.slice(start, start + length));
    }

    // Missing or wrong /Length: cut at the endstream keyword
    const end = this.lexer.findNext(ENDSTREAM_MARKER, start);
    if (end === -1) {
      throw new StructuralError(`Unterminated stream in object at offset ${offset}`, offset);
    }
    let dataEnd = end;
    const bytes = this.lexer.slice(start, end);
    while (dataEnd > start && (bytes[dataEnd - start - 1] === 0x0a || bytes[dataEnd - start - 1] === 0x0d)) {
      dataEnd--;
    }
    return pdfStream(obj, this.lexer.slice(start, dataEnd));
  }

  private streamLength(dict: PdfDict): number | undefined {
    const lengthObj = dictGet(dict, 'Length');
    if (!lengthObj) return undefined;
    const resolved = this.resolve(lengthObj);
    return isNumber(resolved) && resolved.value >= 0 ? resolved.value : undefined;
  }

  /** /Length of an xref stream, read before the xref table exists */
  private readIndirectLength(dict: PdfDict): number | undefined {
    const lengthObj = dictGet(dict, 'Length');
    if (!lengthObj || !isRef(lengthObj)) return undefined;
    const entry = this.xref.get(lengthObj.objNum);
    if (!entry || entry.free || entry.streamObjNum !== undefined) return undefined;
    const saved = this.lexer.position;
    try {
      const resolved = this.parseObjectAt(entry.offset);
      return isNumber(resolved) ? resolved.value : undefined;
    } finally {
      this.lexer.position = saved;
    }
  }

  private getCompressedObject(streamObjNum: number, index: number): PdfObject {
    let objStm = this.objectStreams.get(streamObjNum);
    if (!objStm) {
      const stream = this.getObject(streamObjNum);
      if (!isStream(stream)) return PDF_NULL;

      const data = this.decodeStreamData(stream);
      const n = dictGetNumber(stream.dict, 'N') ?? 0;
      const first = dictGetNumber(stream.dict, 'First') ?? 0;
      const header = new PdfLexer(data);
      const offsets: number[] = [];
      for (let i = 0; i < n; i++) {
        const num = header.nextToken();
        const rel = header.nextToken();
        if (num.type !== 'number' || rel.type !== 'number') break;
        offsets.push(first + rel.value);
      }
      objStm = { data, offsets };
      this.objectStreams.set(streamObjNum, objStm);
    }

    if (index >= objStm.offsets.length) return PDF_NULL;
    return readObject(new PdfLexer(objStm.data, objStm.offsets[index]));
  }

  /** Strings and stream bodies are encrypted with the key of their enclosing object. */
  private decryptObject(obj: PdfObject, objNum: number, gen: number): PdfObject {
    const security = this.security;
    if (!security) return obj;

    const walk = (node: PdfObject): PdfObject => {
      switch (node.kind) {
        case 'string':
          return pdfString(security.decrypt(node.value, objNum, gen));
        case 'array':
          return pdfArray(node.items.map(walk));
        case 'dict':
          return pdfDict(new Map([...node.entries].map(([key, value]) => [key, walk(value)])));
        case 'stream': {
          const dict = pdfDict(new Map([...node.dict.entries].map(([key, value]) => [key, walk(value)])));
          // Cross-reference streams are never encrypted
          if (dictGetName(dict, 'Type') === 'XRef') return pdfStream(dict, node.data);
          return pdfStream(dict, security.decrypt(node.data, objNum, gen));
        }
        default:
          return node;
      }
    };

    return walk(obj);
  }

  private collectPages(node: PdfObject, pages: PdfObject[], seen: Set<string>): void {
    if (isRef(node)) {
      const key = `${node.objNum}:${node.gen}`;
      if (seen.has(key)) return;
      seen.add(key);
    }

    const dict = asDict(this.resolve(node));
    if (!dict) return;

    const kidsObj = dictGet(dict, 'Kids');
    const kids: PdfArray | null = kidsObj ? asArray(this.resolve(kidsObj)) : null;
    const type = dictGetName(dict, 'Type');

    if (type === 'Page' || (type !== 'Pages' && !kids)) {
      pages.push(node);
      return;
    }
    for (const kid of kids?.items ?? []) {
      this.collectPages(kid, pages, seen);
    }
  }
}

function asArray(obj: PdfObject): PdfArray | null {
  return isArray(obj) ? obj : null;
}
