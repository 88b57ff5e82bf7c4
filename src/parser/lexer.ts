/**
 * PDF Lexer / Tokenizer
 *
 * Turns raw PDF bytes into tokens. Whitespace and `%` comments are skipped.
 * The token's `type` decides the type of its `value`, so callers narrow with
 * a plain switch instead of casting.
 */

export type Token =
  | { readonly type: 'number'; readonly value: number; readonly offset: number }
  | { readonly type: 'string'; readonly value: Uint8Array; readonly offset: number }
  | { readonly type: 'hexstring'; readonly value: Uint8Array; readonly offset: number }
  | { readonly type: 'name'; readonly value: string; readonly offset: number }
  | { readonly type: 'bool'; readonly value: boolean; readonly offset: number }
  | { readonly type: 'null'; readonly offset: number }
  | { readonly type: 'keyword'; readonly value: string; readonly offset: number }
  | { readonly type: 'arrayStart' | 'arrayEnd' | 'dictStart' | 'dictEnd' | 'eof'; readonly offset: number };

export type TokenType = Token['type'];

const WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);
const DELIMITERS = new Set([
  0x28, 0x29, // ( )
  0x3c, 0x3e, // < >
  0x5b, 0x5d, // [ ]
  0x7b, 0x7d, // { }
  0x2f,       // /
  0x25,       // %
]);

export function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

export function isDelimiter(byte: number): boolean {
  return DELIMITERS.has(byte);
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

function isOctalDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x37;
}

/** Value of a hex digit, or -1 */
export function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

const ESCAPES: Record<number, number> = {
  0x6e: 0x0a, // \n
  0x72: 0x0d, // \r
  0x74: 0x09, // \t
  0x62: 0x08, // \b
  0x66: 0x0c, // \f
  0x28: 0x28, // \(
  0x29: 0x29, // \)
  0x5c: 0x5c, // \\
};

export class PdfLexer {
  private readonly data: Uint8Array;
  private pos: number;

  constructor(data: Uint8Array, offset = 0) {
    this.data = data;
    this.pos = offset;
  }

  get position(): number {
    return this.pos;
  }

  set position(offset: number) {
    this.pos = offset;
  }

  get length(): number {
    return this.data.length;
  }

  get atEnd(): boolean {
    return this.pos >= this.data.length;
  }

  peek(): number {
    return this.pos < this.data.length ? this.data[this.pos] : -1;
  }

  read(): number {
    return this.pos < this.data.length ? this.data[this.pos++] : -1;
  }

  skipWhitespaceAndComments(): void {
    while (this.pos < this.data.length) {
      const b = this.data[this.pos];
      if (isWhitespace(b)) {
        this.pos++;
      } else if (b === 0x25) {
        while (this.pos < this.data.length) {
          const c = this.data[this.pos++];
          if (c === 0x0a || c === 0x0d) break;
        }
      } else {
        return;
      }
    }
  }

  nextToken(): Token {
    for (;;) {
      this.skipWhitespaceAndComments();
      const offset = this.pos;
      if (offset >= this.data.length) return { type: 'eof', offset };

      const b = this.data[offset];
      const next = offset + 1 < this.data.length ? this.data[offset + 1] : -1;

      if (b === 0x3c && next === 0x3c) {
        this.pos += 2;
        return { type: 'dictStart', offset };
      }
      if (b === 0x3e && next === 0x3e) {
        this.pos += 2;
        return { type: 'dictEnd', offset };
      }
      if (b === 0x3c) return { type: 'hexstring', value: this.readHexString(), offset };
      if (b === 0x28) return { type: 'string', value: this.readLiteralString(), offset };
      if (b === 0x5b) {
        this.pos++;
        return { type: 'arrayStart', offset };
      }
      if (b === 0x5d) {
        this.pos++;
        return { type: 'arrayEnd', offset };
      }
      if (b === 0x2f) return { type: 'name', value: this.readName(), offset };
      if (isDigit(b) || b === 0x2d || b === 0x2b || b === 0x2e) return this.readNumber(offset);
      if (b >= 0x41 && b <= 0x7a) return this.readKeyword(offset);

      // Stray byte (e.g. an unmatched ")" or "}"): skip it
      this.pos++;
    }
  }

  private readHexString(): Uint8Array {
    this.pos++; // <
    const bytes: number[] = [];
    let high = -1;

    while (this.pos < this.data.length) {
      const c = this.data[this.pos++];
      if (c === 0x3e) break;
      const v = hexValue(c);
      if (v === -1) continue;
      if (high === -1) {
        high = v;
      } else {
        bytes.push((high << 4) | v);
        high = -1;
      }
    }

    // Odd digit count: the last digit is followed by an implicit 0
    if (high !== -1) bytes.push(high << 4);

    return new Uint8Array(bytes);
  }

  private readLiteralString(): Uint8Array {
    this.pos++; // (
    const bytes: number[] = [];
    let depth = 1;

    while (this.pos < this.data.length) {
      const c = this.data[this.pos++];

      if (c === 0x28) {
        depth++;
        bytes.push(c);
      } else if (c === 0x29) {
        if (--depth === 0) break;
        bytes.push(c);
      } else if (c === 0x5c) {
        if (this.pos >= this.data.length) break;
        const esc = this.data[this.pos++];
        if (esc in ESCAPES) {
          bytes.push(ESCAPES[esc]);
        } else if (esc === 0x0d) {
          // line continuation, CR or CRLF
          if (this.peek() === 0x0a) this.pos++;
        } else if (esc === 0x0a) {
          // line continuation, LF
        } else if (isOctalDigit(esc)) {
          let octal = esc - 0x30;
          for (let i = 0; i < 2 && isOctalDigit(this.peek()); i++) {
            octal = (octal << 3) | (this.data[this.pos++] - 0x30);
          }
          bytes.push(octal & 0xff);
        } else {
          bytes.push(esc);
        }
      } else {
        bytes.push(c);
      }
    }

    return new Uint8Array(bytes);
  }

  private readName(): string {
    this.pos++; // /
    let name = '';

    while (this.pos < this.data.length) {
      const c = this.data[this.pos];
      if (isWhitespace(c) || isDelimiter(c)) break;

      if (c === 0x23 && this.pos + 2 < this.data.length) {
        const h1 = hexValue(this.data[this.pos + 1]);
        const h2 = hexValue(this.data[this.pos + 2]);
        if (h1 !== -1 && h2 !== -1) {
          name += String.fromCharCode((h1 << 4) | h2);
          this.pos += 3;
          continue;
        }
      }

      name += String.fromCharCode(c);
      this.pos++;
    }

    return name;
  }

  private readNumber(offset: number): Token {
    let text = '';
    let isReal = false;

    if (this.data[this.pos] === 0x2d || this.data[this.pos] === 0x2b) {
      text += String.fromCharCode(this.data[this.pos++]);
    }

    while (this.pos < this.data.length) {
      const c = this.data[this.pos];
      if (isDigit(c)) {
        text += String.fromCharCode(c);
      } else if (c === 0x2e && !isReal) {
        isReal = true;
        text += '.';
      } else {
        break;
      }
      this.pos++;
    }

    const value = isReal ? parseFloat(text) : parseInt(text, 10);
    if (Number.isNaN(value)) {
      // A lone sign or dot; PDF readers treat it as zero
      return { type: 'number', value: 0, offset };
    }
    return { type: 'number', value, offset };
  }

  private readKeyword(offset: number): Token {
    let word = '';

    while (this.pos < this.data.length) {
      const c = this.data[this.pos];
      if (isWhitespace(c) || isDelimiter(c)) break;
      word += String.fromCharCode(c);
      this.pos++;
    }

    if (word === 'true') return { type: 'bool', value: true, offset };
    if (word === 'false') return { type: 'bool', value: false, offset };
    if (word === 'null') return { type: 'null', offset };
    return { type: 'keyword', value: word, offset };
  }

  /** Read up to the next LF or CRLF; the line ending is consumed but not returned. */
  readLine(): string {
    let line = '';
    while (this.pos < this.data.length) {
      const c = this.data[this.pos++];
      if (c === 0x0a) break;
      if (c === 0x0d) {
        if (this.peek() === 0x0a) this.pos++;
        break;
      }
      line += String.fromCharCode(c);
    }
    return line;
  }

  slice(start: number, end: number): Uint8Array {
    return this.data.subarray(start, end);
  }

  /** Offset of the last occurrence of `needle`, or -1 */
  findLast(needle: Uint8Array): number {
    for (let i = this.data.length - needle.length; i >= 0; i--) {
      if (this.matchesAt(needle, i)) return i;
    }
    return -1;
  }

  /** Offset of the first occurrence of `needle` at or after `from`, or -1 */
  findNext(needle: Uint8Array, from = this.pos): number {
    for (let i = from; i <= this.data.length - needle.length; i++) {
      if (this.matchesAt(needle, i)) return i;
    }
    return -1;
  }

  private matchesAt(needle: Uint8Array, at: number): boolean {
    for (let j = 0; j < needle.length; j++) {
      if (this.data[at + j] !== needle[j]) return false;
    }
    return true;
  }
}
