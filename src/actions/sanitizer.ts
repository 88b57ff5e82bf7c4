/**
 * Sanitizer: one removal pass over a subgraph.
 *
 * Entries are collected while a dictionary or array is scanned and removed
 * only after the scan. Removing an action can leave a container newly
 * empty or uncover actions that the same pass has already walked past;
 * the convergence driver repeats passes until nothing changes.
 */

import type { PdfArray, PdfDict, PdfObject } from '../parser/types.js';
import { asDict } from '../parser/types.js';
import type { Logger } from '../logger.js';
import type { ObjectGraph } from './graph.js';
import { VisitedSet, deref, objectKey } from './graph.js';
import { isJavaScriptAction } from './classifier.js';

/** Keys whose value is deleted outright when it is a JavaScript action */
const DIRECT_ACTION_KEYS = new Set(['A', 'OpenAction', 'Next']);

export interface PassContext {
  readonly graph: ObjectGraph;
  /** Indirect objects already handled in this pass */
  readonly visited: VisitedSet;
  readonly logger: Logger;
}

export function createPassContext(graph: ObjectGraph, logger: Logger): PassContext {
  return { graph, visited: new VisitedSet(), logger };
}

/**
 * Remove JavaScript actions from `node` and everything reachable from it
 * that this pass has not visited yet. Returns true if anything was removed.
 */
export function sanitizePass(node: PdfObject, ctx: PassContext): boolean {
  const { node: target, id } = deref(ctx.graph, node);
  if (id && !ctx.visited.enter(id)) {
    ctx.logger.debug(`Skipping already visited object ${objectKey(id)}`);
    return false;
  }
  const label = id ? `object ${objectKey(id)}` : 'direct object';

  switch (target.kind) {
    case 'dict':
      return sanitizeDict(target, label, ctx);
    case 'stream':
      return sanitizeDict(target.dict, label, ctx);
    case 'array':
      return sanitizeArray(target, label, ctx);
    case 'ref':
    case 'name':
    case 'string':
    case 'number':
    case 'bool':
    case 'null':
      return false;
  }
}

function sanitizeDict(dict: PdfDict, label: string, ctx: PassContext): boolean {
  const doomed: string[] = [];
  let changed = false;

  for (const [key, value] of [...dict.entries]) {
    if (DIRECT_ACTION_KEYS.has(key)) {
      if (isJavaScriptAction(value, ctx.graph)) {
        ctx.logger.debug(`Removing JavaScript /${key} from ${label}`);
        doomed.push(key);
      } else if (sanitizePass(value, ctx)) {
        changed = true;
      }
      continue;
    }

    if (key === 'AA') {
      const actions = asDict(ctx.graph.resolve(value));
      if (actions) {
        const result = sanitizeAdditionalActions(actions, label, ctx);
        if (result.changed) changed = true;
        if (result.emptied) {
          ctx.logger.debug(`Removing emptied /AA from ${label}`);
          doomed.push(key);
        }
        continue;
      }
    }

    if (key === 'Names') {
      const names = asDict(ctx.graph.resolve(value));
      if (names?.entries.delete('JavaScript')) {
        ctx.logger.info(`Removed /JavaScript name tree from /Names of ${label}`);
        changed = true;
      }
    }

    if (sanitizePass(value, ctx)) changed = true;
  }

  for (const key of doomed) dict.entries.delete(key);
  return changed || doomed.length > 0;
}

interface AdditionalActionsResult {
  readonly changed: boolean;
  /** True when this call removed the last remaining event */
  readonly emptied: boolean;
}

function sanitizeAdditionalActions(actions: PdfDict, label: string, ctx: PassContext): AdditionalActionsResult {
  const doomed: string[] = [];
  let changed = false;

  for (const [event, action] of [...actions.entries]) {
    if (isJavaScriptAction(action, ctx.graph)) {
      doomed.push(event);
    } else if (sanitizePass(action, ctx)) {
      changed = true;
    }
  }

  for (const event of doomed) {
    ctx.logger.debug(`Removing JavaScript /AA /${event} from ${label}`);
    actions.entries.delete(event);
  }

  return {
    changed: changed || doomed.length > 0,
    emptied: doomed.length > 0 && actions.entries.size === 0,
  };
}

function sanitizeArray(array: PdfArray, label: string, ctx: PassContext): boolean {
  const items = [...array.items];
  const doomed: number[] = [];
  let changed = false;

  items.forEach((item, index) => {
    if (isJavaScriptAction(item, ctx.graph)) {
      doomed.push(index);
    } else if (sanitizePass(item, ctx)) {
      changed = true;
    }
  });

  // Descending, so earlier indices stay valid
  for (const index of doomed.reverse()) {
    ctx.logger.debug(`Removing JavaScript element ${index} from array in ${label}`);
    array.items.splice(index, 1);
  }
  return changed || doomed.length > 0;
}
