/**
 * In-memory operations. These work anywhere an inflate implementation is
 * registered, so they are shared by the Node and browser entry points.
 */

import { PdfDocument } from './document.js';
import { findJavaScript } from './actions/detector.js';
import type { Finding } from './actions/detector.js';
import { sanitizeDocument } from './actions/driver.js';
import { toDefangError } from './errors.js';
import { silentLogger } from './logger.js';
import type { InspectOptions, SanitizePdfOptions, SanitizedPdf } from './types.js';

/**
 * Look for JavaScript actions in a PDF.
 *
 * @returns where the first action was found, or null for a clean document
 * @throws DefangError when the document cannot be opened or traversed
 */
export function inspectPdf(data: Uint8Array, options: InspectOptions = {}): Finding | null {
  const doc = PdfDocument.fromBuffer(data, options);
  try {
    return findJavaScript(doc, { logger: options.logger });
  } catch (err) {
    throw toDefangError(err);
  } finally {
    doc.dispose();
  }
}

/**
 * Remove JavaScript actions from a PDF and return the rewritten file.
 * The output is produced even when nothing had to be removed.
 *
 * @throws DefangError when the document cannot be opened or rewritten
 */
export function sanitizePdf(data: Uint8Array, options: SanitizePdfOptions = {}): SanitizedPdf {
  const logger = options.logger ?? silentLogger;
  const doc = PdfDocument.fromBuffer(data, options);
  try {
    if (doc.isEncrypted) logger.info('Document is encrypted; the sanitized copy is written without encryption');
    const report = sanitizeDocument(doc, { maxPasses: options.maxPasses, logger });
    if (!report.changed) logger.info('No JavaScript found to remove');
    return { bytes: doc.save(), report };
  } catch (err) {
    throw toDefangError(err);
  } finally {
    doc.dispose();
  }
}
