/**
 * PDF Standard Security Handler, revisions 2-4 (RC4 and AES-128).
 *
 * Implements the key derivation and user password check of ISO 32000-1,
 * 7.6.3. Revision 5+ (AES-256) is not supported and reports as password
 * protected.
 */

import type { PdfDict } from '../parser/types.js';
import { dictGet, dictGetNumber, dictGetName, dictGetString, isDict, isBool } from '../parser/types.js';
import { PasswordProtectedError, StructuralError } from '../errors.js';
import { getCryptoImpl } from './crypto-impl.js';
import type { CryptoImpl } from './crypto-impl.js';

const PASSWORD_PADDING = new Uint8Array([
  0x28, 0xbf, 0x4e, 0x5e, 0x4e, 0x75, 0x8a, 0x41,
  0x64, 0x00, 0x4e, 0x56, 0xff, 0xfa, 0x01, 0x08,
  0x2e, 0x2e, 0x00, 0xb6, 0xd0, 0x68, 0x3e, 0x80,
  0x2f, 0x0c, 0xa9, 0xfe, 0x64, 0x53, 0x69, 0x7a,
]);

const AES_SALT = new Uint8Array([0x73, 0x41, 0x6c, 0x54]); // "sAlT"

type CryptMethod = 'rc4' | 'aes' | 'none';

export function padPassword(password: string): Uint8Array {
  const input = new TextEncoder().encode(password).subarray(0, 32);
  const padded = new Uint8Array(32);
  padded.set(input);
  padded.set(PASSWORD_PADDING.subarray(0, 32 - input.length), input.length);
  return padded;
}

export function rc4(key: Uint8Array, data: Uint8Array): Uint8Array {
  const s = new Uint8Array(256);
  for (let i = 0; i < 256; i++) s[i] = i;
  for (let i = 0, j = 0; i < 256; i++) {
    j = (j + s[i] + key[i % key.length]) & 0xff;
    [s[i], s[j]] = [s[j], s[i]];
  }

  const out = new Uint8Array(data.length);
  for (let k = 0, x = 0, y = 0; k < data.length; k++) {
    x = (x + 1) & 0xff;
    y = (y + s[x]) & 0xff;
    [s[x], s[y]] = [s[y], s[x]];
    out[k] = data[k] ^ s[(s[x] + s[y]) & 0xff];
  }
  return out;
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

function int32LE(n: number): Uint8Array {
  return new Uint8Array([n & 0xff, (n >>> 8) & 0xff, (n >>> 16) & 0xff, (n >>> 24) & 0xff]);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function cryptMethodOf(encryptDict: PdfDict, v: number): CryptMethod {
  if (v < 4) return 'rc4';
  const stmF = dictGetName(encryptDict, 'StmF') ?? 'Identity';
  if (stmF === 'Identity') return 'none';
  const cf = dictGet(encryptDict, 'CF');
  const filter = cf && isDict(cf) ? dictGet(cf, stmF) : undefined;
  const cfm = filter && isDict(filter) ? dictGetName(filter, 'CFM') : undefined;
  if (cfm === 'AESV2') return 'aes';
  if (cfm === 'None') return 'none';
  return 'rc4';
}

export class StandardSecurityHandler {
  private constructor(
    private readonly crypto: CryptoImpl,
    private readonly key: Uint8Array,
    private readonly method: CryptMethod,
  ) {}

  /**
   * Authenticate `password` as the user password (empty by default).
   * Throws PasswordProtectedError when it does not match or the handler
   * cannot be used.
   */
  static open(encryptDict: PdfDict, fileId: Uint8Array, password = ''): StandardSecurityHandler {
    const crypto = getCryptoImpl();
    if (!crypto) throw new PasswordProtectedError('Encrypted PDF: no crypto implementation available');

    if (dictGetName(encryptDict, 'Filter') !== 'Standard') {
      throw new PasswordProtectedError('Encrypted PDF: unsupported security handler');
    }
    const v = dictGetNumber(encryptDict, 'V') ?? 0;
    const r = dictGetNumber(encryptDict, 'R') ?? 0;
    if (v >= 5 || r >= 5) {
      throw new PasswordProtectedError('Encrypted PDF: AES-256 encryption is not supported');
    }

    const o = dictGetString(encryptDict, 'O');
    const u = dictGetString(encryptDict, 'U');
    if (!o || !u) throw new PasswordProtectedError('Encrypted PDF: missing /O or /U entry');

    const p = dictGetNumber(encryptDict, 'P') ?? 0;
    const keyLength = r === 2 ? 5 : (dictGetNumber(encryptDict, 'Length') ?? 40) / 8;
    const metadataFlag = dictGet(encryptDict, 'EncryptMetadata');
    const encryptMetadata = !(metadataFlag && isBool(metadataFlag) && !metadataFlag.value);

    // Algorithm 2: encryption key from the padded password
    let input = concat(padPassword(password), o.subarray(0, 32), int32LE(p), fileId);
    if (r >= 4 && !encryptMetadata) input = concat(input, new Uint8Array([0xff, 0xff, 0xff, 0xff]));
    let hash = crypto.md5(input);
    if (r >= 3) {
      for (let i = 0; i < 50; i++) hash = crypto.md5(hash.subarray(0, keyLength));
    }
    const key = hash.slice(0, keyLength);

    // Algorithms 4 and 5: the key must reproduce /U
    let verified: boolean;
    if (r === 2) {
      verified = u.length >= 32 && bytesEqual(rc4(key, PASSWORD_PADDING), u.subarray(0, 32));
    } else {
      let check = rc4(key, crypto.md5(concat(PASSWORD_PADDING, fileId)));
      for (let i = 1; i <= 19; i++) {
        check = rc4(key.map(b => b ^ i), check);
      }
      verified = u.length >= 16 && bytesEqual(check.subarray(0, 16), u.subarray(0, 16));
    }
    if (!verified) throw new PasswordProtectedError();

    return new StandardSecurityHandler(crypto, key, cryptMethodOf(encryptDict, v));
  }

  /** Decrypt a string or stream body belonging to object `objNum gen`. */
  decrypt(data: Uint8Array, objNum: number, gen: number): Uint8Array {
    if (this.method === 'none' || data.length === 0) return data;

    // Algorithm 1: per-object key
    const objectKey = this.crypto.md5(concat(
      this.key,
      new Uint8Array([objNum & 0xff, (objNum >> 8) & 0xff, (objNum >> 16) & 0xff, gen & 0xff, (gen >> 8) & 0xff]),
      this.method === 'aes' ? AES_SALT : new Uint8Array(0),
    )).subarray(0, Math.min(this.key.length + 5, 16));

    if (this.method === 'rc4') return rc4(objectKey, data);

    if (data.length < 32) {
      throw new StructuralError(`AES-encrypted data of object ${objNum} ${gen} is too short`);
    }
    try {
      return this.crypto.aesCbcDecrypt(objectKey, data.subarray(0, 16), data.subarray(16));
    } catch (err) {
      throw new StructuralError(`Cannot decrypt object ${objNum} ${gen}`, undefined, { cause: err });
    }
  }
}
