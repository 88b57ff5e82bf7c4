import { asDict, isArray } from '../parser/types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { InvalidInvocationError } from '../errors.js';
import type { ObjectGraph } from './graph.js';
import type { PassContext } from './sanitizer.js';
import { createPassContext, sanitizePass } from './sanitizer.js';

export const DEFAULT_MAX_PASSES = 10;

export interface SanitizeOptions {
  /** Upper bound on removal passes. Default: 10 */
  readonly maxPasses?: number;
  readonly logger?: Logger;
}

export interface ConvergenceReport {
  /** Whether any pass removed something; always true when the limit was hit */
  readonly changed: boolean;
  /** The last pass still made changes when the pass budget ran out */
  readonly reachedLimit: boolean;
  /** Number of passes run, including the final one without changes */
  readonly passes: number;
}

/**
 * Run removal passes until one makes no change, or until `maxPasses` have run.
 * Each pass starts from the catalog and then visits every page's annotations.
 */
export function sanitizeDocument(graph: ObjectGraph, options: SanitizeOptions = {}): ConvergenceReport {
  const logger = options.logger ?? silentLogger;
  const maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
  if (!Number.isInteger(maxPasses) || maxPasses < 1) {
    throw new InvalidInvocationError(`maxPasses must be a positive integer, got ${maxPasses}`);
  }

  let changed = false;
  for (let pass = 1; pass <= maxPasses; pass++) {
    logger.debug(`Starting removal pass ${pass}`);
    const ctx = createPassContext(graph, logger);

    let passChanged = sanitizePass(graph.root, ctx);
    if (sanitizeAnnotations(graph, ctx)) passChanged = true;

    if (!passChanged) {
      logger.debug(`No changes in pass ${pass}, removal complete`);
      return { changed, reachedLimit: false, passes: pass };
    }
    changed = true;
    logger.info(`Removed JavaScript during pass ${pass}`);
  }

  logger.warn(`Stopped after ${maxPasses} passes with changes still being made; some JavaScript may remain`);
  return { changed: true, reachedLimit: true, passes: maxPasses };
}

function sanitizeAnnotations(graph: ObjectGraph, ctx: PassContext): boolean {
  let changed = false;

  graph.pages.forEach((pageObj, index) => {
    const page = asDict(graph.resolve(pageObj));
    const annotsObj = page?.entries.get('Annots');
    if (annotsObj === undefined) return;

    const annots = graph.resolve(annotsObj);
    if (!isArray(annots)) {
      ctx.logger.warn(`Page ${index + 1} /Annots is not an array (${annots.kind}), skipping`);
      return;
    }
    for (const annot of [...annots.items]) {
      if (sanitizePass(annot, ctx)) changed = true;
    }
  });

  return changed;
}
