import type { PdfDict, PdfObject } from '../parser/types.js';
import { isName } from '../parser/types.js';
import type { ObjectGraph } from './graph.js';
import { VisitedSet, deref } from './graph.js';

/** Dictionary keys whose value is an action (or a chain of actions) */
export const ACTION_KEYS = ['A', 'AA', 'OpenAction'] as const;

/** Page additional-action events: page open, page close */
export const PAGE_EVENTS = ['O', 'C'] as const;

/** Annotation additional-action events */
export const ANNOTATION_EVENTS = ['E', 'X', 'D', 'U', 'Fo', 'Bl', 'PO', 'PC', 'PV', 'PI'] as const;

/** True when `dict` is an action dictionary whose /S is /JavaScript */
export function isJavaScriptDict(dict: PdfDict, graph: ObjectGraph): boolean {
  const subtype = dict.entries.get('S');
  return subtype !== undefined && isName(graph.resolve(subtype), 'JavaScript');
}

/**
 * Whether `node` is a JavaScript action, or an array holding one at any
 * depth. Stream dictionaries count as dictionaries. Arrays reached through
 * a reference they already passed are not entered again.
 */
export function isJavaScriptAction(node: PdfObject, graph: ObjectGraph, seen = new VisitedSet()): boolean {
  const { node: target, id } = deref(graph, node);
  if (id && !seen.enter(id)) return false;

  switch (target.kind) {
    case 'dict':
      return isJavaScriptDict(target, graph);
    case 'stream':
      return isJavaScriptDict(target.dict, graph);
    case 'array':
      return target.items.some(item => isJavaScriptAction(item, graph, seen));
    case 'ref':
    case 'name':
    case 'string':
    case 'number':
    case 'bool':
    case 'null':
      return false;
  }
}
