import { inflateSync, constants } from 'node:zlib';
import { createHash, createDecipheriv } from 'node:crypto';
import { setInflate } from './stream/inflate.js';
import { setCryptoImpl } from './crypto/crypto-impl.js';

function nodeInflate(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(inflateSync(data));
  } catch {
    // Truncated streams: keep whatever inflated before the damage
    return new Uint8Array(inflateSync(data, { finishFlush: constants.Z_SYNC_FLUSH }));
  }
}

function nodeAesCbcDecrypt(key: Uint8Array, iv: Uint8Array, data: Uint8Array): Uint8Array {
  const decipher = createDecipheriv(`aes-${key.length * 8}-cbc`, key, iv);
  decipher.setAutoPadding(true);
  const head = decipher.update(data);
  const tail = decipher.final();
  const result = new Uint8Array(head.length + tail.length);
  result.set(head);
  result.set(tail, head.length);
  return result;
}

/** Install node:zlib inflate and node:crypto primitives. Safe to call repeatedly. */
export function registerNodeRuntime(): void {
  setInflate(nodeInflate);
  setCryptoImpl({
    md5: (data) => new Uint8Array(createHash('md5').update(data).digest()),
    aesCbcDecrypt: nodeAesCbcDecrypt,
  });
}
