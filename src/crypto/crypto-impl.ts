/**
 * Injectable crypto primitives for the standard security handler.
 * The Node entry registers node:crypto; the browser entry registers nothing,
 * which makes every encrypted document report as password protected there.
 */

export interface CryptoImpl {
  md5(data: Uint8Array): Uint8Array;
  aesCbcDecrypt(key: Uint8Array, iv: Uint8Array, data: Uint8Array): Uint8Array;
}

let impl: CryptoImpl | null = null;

export function setCryptoImpl(next: CryptoImpl): void {
  impl = next;
}

export function getCryptoImpl(): CryptoImpl | null {
  return impl;
}
