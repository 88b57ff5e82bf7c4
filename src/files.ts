/**
 * File-level operations for Node. Every failure is reported in the result
 * value; nothing here throws.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { inspectPdf, sanitizePdf } from './api.js';
import { InputNotFoundError, InvalidInvocationError, OutputWriteError, toDefangError } from './errors.js';
import { silentLogger } from './logger.js';
import type { CheckResult, InspectOptions, SanitizePdfOptions, SanitizeResult } from './types.js';

export async function checkFile(path: string, options: InspectOptions = {}): Promise<CheckResult> {
  const logger = options.logger ?? silentLogger;
  logger.info(`Checking for JavaScript in: ${path}`);
  try {
    const finding = inspectPdf(await readInput(path), options);
    if (!finding) {
      logger.info(`No JavaScript found in ${path}`);
      return { status: 'clean' };
    }
    return { status: 'detected', finding };
  } catch (err) {
    const error = toDefangError(err);
    logger.error(`Cannot check ${path}: ${error.message}`, err);
    return { status: 'unverified', error };
  }
}

/**
 * Write a copy of `input` with its JavaScript actions removed to `output`.
 * The two paths must differ.
 */
export async function sanitizeFile(input: string, output: string, options: SanitizePdfOptions = {}): Promise<SanitizeResult> {
  const logger = options.logger ?? silentLogger;
  logger.info(`Removing JavaScript from ${input}, writing ${output}`);
  try {
    const data = await readInput(input);
    if (resolve(input) === resolve(output)) {
      throw new InvalidInvocationError('Input and output paths must be different');
    }

    const { bytes, report } = sanitizePdf(data, options);
    try {
      await writeFile(output, bytes);
    } catch (err) {
      throw new OutputWriteError(output, { cause: err });
    }

    logger.info(`Saved sanitized file to ${output}`);
    return { ok: true, report };
  } catch (err) {
    const error = toDefangError(err);
    logger.error(`Failed to sanitize ${input}: ${error.message}`, err);
    return { ok: false, error };
  }
}

/** True only when JavaScript was positively found; unreadable files count as clean. */
export async function containsJavaScript(path: string, options: InspectOptions = {}): Promise<boolean> {
  const result = await checkFile(path, options);
  return result.status === 'detected';
}

/** True when the sanitized copy was written. */
export async function removeJavaScript(input: string, output: string, options: SanitizePdfOptions = {}): Promise<boolean> {
  const result = await sanitizeFile(input, output, options);
  return result.ok;
}

async function readInput(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (err) {
    throw new InputNotFoundError(path, { cause: err });
  }
}
