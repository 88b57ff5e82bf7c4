/**
 * Injectable inflate implementation.
 * Each entry point installs one at load time: node:zlib for Node, fflate for browsers.
 */

export type InflateFn = (data: Uint8Array) => Uint8Array;

let impl: InflateFn | null = null;

export function setInflate(fn: InflateFn): void {
  impl = fn;
}

export function inflate(data: Uint8Array): Uint8Array {
  if (!impl) {
    throw new Error('No inflate implementation configured. Import from "pdf-defang" or "pdf-defang/browser".');
  }
  return impl(data);
}
