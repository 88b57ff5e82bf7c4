/**
 * Public types for the pdf-defang library.
 */

import type { DefangError } from './errors.js';
import type { Logger } from './logger.js';
import type { Finding } from './actions/detector.js';
import type { ConvergenceReport, SanitizeOptions } from './actions/driver.js';

/** Options for opening a PDF */
export interface LoadOptions {
  /** User password for encrypted PDFs. Default: '' */
  readonly password?: string;
}

export interface InspectOptions extends LoadOptions {
  readonly logger?: Logger;
}

export interface SanitizePdfOptions extends LoadOptions, SanitizeOptions {}

/** Outcome of checking one file */
export type CheckResult =
  | { readonly status: 'detected'; readonly finding: Finding }
  | { readonly status: 'clean' }
  /** The file could not be opened or traversed; nothing is known about it */
  | { readonly status: 'unverified'; readonly error: DefangError };

/** Outcome of sanitizing one file; failures are reported, never thrown */
export type SanitizeResult =
  | { readonly ok: true; readonly report: ConvergenceReport }
  | { readonly ok: false; readonly error: DefangError };

/** A sanitized document held in memory */
export interface SanitizedPdf {
  readonly bytes: Uint8Array;
  readonly report: ConvergenceReport;
}
