/**
 * PdfDocument: an opened PDF as a mutable object graph.
 *
 * Objects are parsed on first access and cached, so edits made through the
 * graph are what `save()` writes back out.
 */

import { PdfParser } from './parser/parser.js';
import type { PdfDict, PdfObject } from './parser/types.js';
import { PDF_NULL } from './parser/types.js';
import type { ObjectGraph } from './actions/graph.js';
import type { SerializableDocument } from './writer/serializer.js';
import { serializeDocument } from './writer/serializer.js';
import { InputNotFoundError, StructuralError, toDefangError } from './errors.js';
import type { LoadOptions } from './types.js';

export class PdfDocument implements ObjectGraph, SerializableDocument {
  /** Page objects in document order, as references where the page tree uses them */
  readonly pages: readonly PdfObject[];

  private parser: PdfParser | null;

  private constructor(parser: PdfParser, pages: PdfObject[]) {
    this.parser = parser;
    this.pages = pages;
  }

  /**
   * Open a PDF from a file path or raw bytes.
   *
   * @param source - file path (string) or raw PDF bytes (Uint8Array)
   */
  static async load(source: string | Uint8Array, options?: LoadOptions): Promise<PdfDocument> {
    if (typeof source !== 'string') return PdfDocument.fromBuffer(source, options);

    const { readFile } = await import('node:fs/promises');
    let buffer: Uint8Array;
    try {
      buffer = await readFile(source);
    } catch (err) {
      if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
        throw new InputNotFoundError(source, { cause: err });
      }
      throw toDefangError(err);
    }
    return PdfDocument.fromBuffer(new Uint8Array(buffer), options);
  }

  /** Synchronously open a PDF already in memory. */
  static fromBuffer(data: Uint8Array, options?: LoadOptions): PdfDocument {
    try {
      const parser = new PdfParser(data, { password: options?.password });
      parser.parse();
      return new PdfDocument(parser, parser.getPageRefs());
    } catch (err) {
      throw toDefangError(err);
    }
  }

  /** The trailer's reference to the catalog */
  get root(): PdfObject {
    return this.getParser().getTrailer().root ?? PDF_NULL;
  }

  get catalog(): PdfDict {
    return this.getParser().getCatalog();
  }

  get trailer(): PdfDict {
    return this.getParser().getTrailer().dict;
  }

  get version(): string {
    return this.getParser().version;
  }

  get pageCount(): number {
    return this.pages.length;
  }

  /** True when the cross-reference data was unusable and rebuilt by scanning */
  get wasRecovered(): boolean {
    return this.getParser().wasRecovered;
  }

  get isEncrypted(): boolean {
    return this.getParser().isEncrypted;
  }

  resolve(obj: PdfObject): PdfObject {
    return this.getParser().resolve(obj);
  }

  getObject(objNum: number, gen = 0): PdfObject {
    return this.getParser().getObject(objNum, gen);
  }

  /** Serialize the document, including every change made to its graph. */
  save(): Uint8Array {
    try {
      return serializeDocument(this);
    } catch (err) {
      throw toDefangError(err);
    }
  }

  /** Release the parsed objects. The document cannot be used afterwards. */
  dispose(): void {
    this.parser = null;
  }

  private getParser(): PdfParser {
    if (!this.parser) throw new StructuralError('Document has been disposed');
    return this.parser;
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
