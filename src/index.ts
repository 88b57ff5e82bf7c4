/**
 * pdf-defang - find and remove JavaScript actions in PDF files
 *
 * @example
 * ```typescript
 * import { checkFile, sanitizeFile } from 'pdf-defang';
 *
 * const check = await checkFile('invoice.pdf');
 * if (check.status === 'detected') {
 *   console.log(`JavaScript in ${check.finding.location}`);
 *   const result = await sanitizeFile('invoice.pdf', 'invoice.clean.pdf');
 *   if (!result.ok) console.error(result.error.message);
 * }
 * ```
 */

import { registerNodeRuntime } from './runtime.js';

registerNodeRuntime();

export { PdfDocument } from './document.js';
export { inspectPdf, sanitizePdf } from './api.js';
export { checkFile, sanitizeFile, containsJavaScript, removeJavaScript } from './files.js';
export { isJavaScriptAction } from './actions/classifier.js';
export { findJavaScript, detect } from './actions/detector.js';
export { sanitizePass, createPassContext } from './actions/sanitizer.js';
export { sanitizeDocument, DEFAULT_MAX_PASSES } from './actions/driver.js';
export { objectIdOf, objectKey } from './actions/graph.js';
export { createLogger, silentLogger } from './logger.js';
export {
  DefangError,
  InputNotFoundError,
  PasswordProtectedError,
  StructuralError,
  OutputWriteError,
  InvalidInvocationError,
} from './errors.js';
export type { DefangErrorCode } from './errors.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';
export type { ObjectGraph, ObjectId } from './actions/graph.js';
export type { Finding, DetectOptions } from './actions/detector.js';
export type { PassContext } from './actions/sanitizer.js';
export type { ConvergenceReport, SanitizeOptions } from './actions/driver.js';
export type { PdfObject, PdfDict, PdfArray, PdfRef } from './parser/types.js';
export type {
  LoadOptions,
  InspectOptions,
  SanitizePdfOptions,
  CheckResult,
  SanitizeResult,
  SanitizedPdf,
} from './types.js';
