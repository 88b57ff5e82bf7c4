/**
 * PDF object model.
 *
 * Dictionaries and arrays are mutable in place: the action engine deletes
 * entries from them, and the serializer writes whatever is left. Every other
 * node is an immutable value.
 */

/** Reference to an indirect object: "objNum gen R" */
export interface PdfRef {
  readonly kind: 'ref';
  readonly objNum: number;
  readonly gen: number;
}

/** A PDF name object, e.g. /Type (stored without the slash, escapes decoded) */
export interface PdfName {
  readonly kind: 'name';
  readonly value: string;
}

/** A PDF string (literal or hex) */
export interface PdfString {
  readonly kind: 'string';
  readonly value: Uint8Array;
}

/** A PDF dictionary << /Key Value ... >> */
export interface PdfDict {
  readonly kind: 'dict';
  readonly entries: Map<string, PdfObject>;
}

/** A PDF array [ ... ] */
export interface PdfArray {
  readonly kind: 'array';
  readonly items: PdfObject[];
}

/** A PDF stream: dictionary + raw (still encoded) byte data */
export interface PdfStream {
  readonly kind: 'stream';
  readonly dict: PdfDict;
  readonly data: Uint8Array;
}

export interface PdfBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** A PDF number (integer or real) */
export interface PdfNumber {
  readonly kind: 'number';
  readonly value: number;
}

export interface PdfNull {
  readonly kind: 'null';
}

export type PdfObject =
  | PdfRef
  | PdfName
  | PdfString
  | PdfDict
  | PdfArray
  | PdfStream
  | PdfBool
  | PdfNumber
  | PdfNull;

/** Cross-reference entry for one object number */
export interface XRefEntry {
  readonly offset: number;
  readonly gen: number;
  readonly free: boolean;
  /** For compressed objects: the object number of the containing object stream */
  readonly streamObjNum?: number;
  /** For compressed objects: the index within the object stream */
  readonly streamIndex?: number;
}

export type XRefTable = Map<number, XRefEntry>;

export interface TrailerInfo {
  readonly size: number;
  readonly root?: PdfRef;
  readonly info?: PdfRef;
  readonly prev?: number;
  readonly dict: PdfDict;
}

// ─── Helper constructors ───

export function pdfRef(objNum: number, gen: number): PdfRef {
  return { kind: 'ref', objNum, gen };
}

export function pdfName(value: string): PdfName {
  return { kind: 'name', value };
}

export function pdfString(value: Uint8Array): PdfString {
  return { kind: 'string', value };
}

export function pdfStringFromText(text: string): PdfString {
  return { kind: 'string', value: new TextEncoder().encode(text) };
}

export function pdfDict(entries?: Map<string, PdfObject>): PdfDict {
  return { kind: 'dict', entries: entries ?? new Map() };
}

export function pdfArray(items?: PdfObject[]): PdfArray {
  return { kind: 'array', items: items ?? [] };
}

export function pdfStream(dict: PdfDict, data: Uint8Array): PdfStream {
  return { kind: 'stream', dict, data };
}

export function pdfBool(value: boolean): PdfBool {
  return { kind: 'bool', value };
}

export function pdfNumber(value: number): PdfNumber {
  return { kind: 'number', value };
}

export const PDF_NULL: PdfNull = { kind: 'null' };

// ─── Type guards ───

export function isRef(obj: PdfObject): obj is PdfRef {
  return obj.kind === 'ref';
}

export function isName(obj: PdfObject, value?: string): obj is PdfName {
  return obj.kind === 'name' && (value === undefined || obj.value === value);
}

export function isString(obj: PdfObject): obj is PdfString {
  return obj.kind === 'string';
}

export function isDict(obj: PdfObject): obj is PdfDict {
  return obj.kind === 'dict';
}

export function isArray(obj: PdfObject): obj is PdfArray {
  return obj.kind === 'array';
}

export function isStream(obj: PdfObject): obj is PdfStream {
  return obj.kind === 'stream';
}

export function isBool(obj: PdfObject): obj is PdfBool {
  return obj.kind === 'bool';
}

export function isNumber(obj: PdfObject): obj is PdfNumber {
  return obj.kind === 'number';
}

/** The dictionary part of a dict or stream, or null for every other kind */
export function asDict(obj: PdfObject): PdfDict | null {
  if (isDict(obj)) return obj;
  if (isStream(obj)) return obj.dict;
  return null;
}

// ─── Dictionary helpers ───

export function dictGet(dict: PdfDict, key: string): PdfObject | undefined {
  return dict.entries.get(key);
}

export function dictGetName(dict: PdfDict, key: string): string | undefined {
  const obj = dict.entries.get(key);
  return obj && isName(obj) ? obj.value : undefined;
}

export function dictGetNumber(dict: PdfDict, key: string): number | undefined {
  const obj = dict.entries.get(key);
  return obj && isNumber(obj) ? obj.value : undefined;
}

export function dictGetString(dict: PdfDict, key: string): Uint8Array | undefined {
  const obj = dict.entries.get(key);
  return obj && isString(obj) ? obj.value : undefined;
}

export function dictGetRef(dict: PdfDict, key: string): PdfRef | undefined {
  const obj = dict.entries.get(key);
  return obj && isRef(obj) ? obj : undefined;
}
