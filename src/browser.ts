/**
 * pdf-defang/browser - in-memory JavaScript detection and removal
 *
 * Uses fflate for decompression instead of node:zlib. Only the buffer API
 * is available (no file paths), and encrypted documents cannot be opened.
 *
 * @example
 * ```typescript
 * import { inspectPdf, sanitizePdf } from 'pdf-defang/browser';
 *
 * const bytes = new Uint8Array(await file.arrayBuffer());
 * if (inspectPdf(bytes)) {
 *   const { bytes: clean } = sanitizePdf(bytes);
 *   download(new Blob([clean], { type: 'application/pdf' }));
 * }
 * ```
 */

import { decompressSync } from 'fflate';
import { setInflate } from './stream/inflate.js';

setInflate((data) => decompressSync(data));

export { inspectPdf, sanitizePdf } from './api.js';
export { createLogger, silentLogger } from './logger.js';
export {
  DefangError,
  PasswordProtectedError,
  StructuralError,
  InvalidInvocationError,
} from './errors.js';
export type { Logger, LogLevel } from './logger.js';
export type { Finding } from './actions/detector.js';
export type { ConvergenceReport } from './actions/driver.js';
export type { InspectOptions, SanitizePdfOptions, SanitizedPdf } from './types.js';
