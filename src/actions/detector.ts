/**
 * Detector: read-only search for JavaScript actions.
 *
 * A generic walk from the document catalog runs first; the well-known
 * locations (open action, name tree, page events, annotation actions) are
 * then checked directly, since the walk can be cut short by the visited set
 * when pages share structure. The first hit ends the search.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import { asDict, isArray } from '../parser/types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { ObjectGraph, ObjectId } from './graph.js';
import { VisitedSet, deref, objectKey } from './graph.js';
import {
  ACTION_KEYS,
  ANNOTATION_EVENTS,
  PAGE_EVENTS,
  isJavaScriptAction,
  isJavaScriptDict,
} from './classifier.js';

/** Where a JavaScript action was found */
export interface Finding {
  /** Human-readable location, e.g. "Document OpenAction" or "/Root/Pages/Kids[0]/AA" */
  readonly location: string;
  /** 1-based page number, when the hit belongs to a page */
  readonly page?: number;
  /** Identity of the dictionary holding the hit, when it is an indirect object */
  readonly objectId?: ObjectId;
}

export interface DetectOptions {
  readonly logger?: Logger;
}

interface ScanState {
  readonly graph: ObjectGraph;
  readonly visited: VisitedSet;
  readonly logger: Logger;
}

/**
 * Find the first JavaScript action in the document, or null when there is
 * none. Errors raised while resolving objects propagate to the caller.
 */
export function findJavaScript(graph: ObjectGraph, options: DetectOptions = {}): Finding | null {
  const logger = options.logger ?? silentLogger;
  const state: ScanState = { graph, visited: new VisitedSet(), logger };

  const finding = scanNode(graph.root, '/Root', state) ?? checkKnownLocations(graph, logger);
  if (finding) {
    logger.warn(`Found JavaScript in ${finding.location}`);
  } else {
    logger.debug(`No JavaScript found after visiting ${state.visited.size} indirect objects`);
  }
  return finding;
}

/**
 * Boolean form of {@link findJavaScript}. Never throws: a document that
 * cannot be traversed is logged and reported as clean.
 */
export function detect(graph: ObjectGraph, options: DetectOptions = {}): boolean {
  const logger = options.logger ?? silentLogger;
  try {
    return findJavaScript(graph, { logger }) !== null;
  } catch (err) {
    logger.error(`JavaScript check failed: ${err instanceof Error ? err.message : String(err)}`, err);
    return false;
  }
}

// ─── Generic walk ───

function scanNode(node: PdfObject, path: string, state: ScanState, owner?: ObjectId): Finding | null {
  const { node: target, id } = deref(state.graph, node);
  if (id) {
    if (!state.visited.enter(id)) return null;
    state.logger.debug(`Checking object ${objectKey(id)} at ${path}`);
  }
  const holder = id ?? owner;

  if (isArray(target)) {
    for (let i = 0; i < target.items.length; i++) {
      const hit = scanNode(target.items[i], `${path}[${i}]`, state, holder);
      if (hit) return hit;
    }
    return null;
  }

  const dict = asDict(target);
  if (!dict) return null;

  if (isJavaScriptDict(dict, state.graph)) return finding(path, holder);

  for (const key of ACTION_KEYS) {
    const value = dict.entries.get(key);
    if (value !== undefined && isJavaScriptAction(value, state.graph)) {
      return finding(`${path}/${key}`, holder);
    }
  }

  for (const [key, value] of dict.entries) {
    const hit = scanNode(value, `${path}/${key}`, state, holder);
    if (hit) return hit;
  }
  return null;
}

// ─── Well-known locations ───

function checkKnownLocations(graph: ObjectGraph, logger: Logger): Finding | null {
  const catalog = asDict(graph.resolve(graph.root));
  if (!catalog) {
    logger.warn('Document catalog is not a dictionary');
    return null;
  }

  const openAction = catalog.entries.get('OpenAction');
  if (openAction !== undefined && isJavaScriptAction(openAction, graph)) {
    return { location: 'Document OpenAction' };
  }

  const names = lookupDict(graph, catalog, 'Names');
  if (names?.entries.has('JavaScript')) {
    return { location: 'Document Names Tree' };
  }

  for (let index = 0; index < graph.pages.length; index++) {
    const pageNum = index + 1;
    const { node, id } = deref(graph, graph.pages[index]);
    const page = asDict(node);
    if (!page) continue;

    const pageActions = lookupDict(graph, page, 'AA');
    if (pageActions) {
      for (const event of PAGE_EVENTS) {
        const action = pageActions.entries.get(event);
        if (action !== undefined && isJavaScriptAction(action, graph)) {
          return { location: `Page ${pageNum} Action (/${event})`, page: pageNum, objectId: id };
        }
      }
    }

    const hit = checkAnnotations(graph, page, pageNum, logger);
    if (hit) return hit;
  }
  return null;
}

function checkAnnotations(graph: ObjectGraph, page: PdfDict, pageNum: number, logger: Logger): Finding | null {
  const annotsObj = page.entries.get('Annots');
  if (annotsObj === undefined) return null;

  const annots = graph.resolve(annotsObj);
  if (!isArray(annots)) {
    logger.debug(`Page ${pageNum} /Annots is not an array, skipping`);
    return null;
  }

  for (const item of annots.items) {
    const { node, id } = deref(graph, item);
    const annot = asDict(node);
    if (!annot) continue;

    const action = annot.entries.get('A');
    if (action !== undefined && isJavaScriptAction(action, graph)) {
      return { location: `Annotation Action (Page ${pageNum})`, page: pageNum, objectId: id };
    }

    const additional = lookupDict(graph, annot, 'AA');
    if (!additional) continue;
    for (const event of ANNOTATION_EVENTS) {
      const eventAction = additional.entries.get(event);
      if (eventAction !== undefined && isJavaScriptAction(eventAction, graph)) {
        return { location: `Annotation Additional Action /${event} (Page ${pageNum})`, page: pageNum, objectId: id };
      }
    }
  }
  return null;
}

function lookupDict(graph: ObjectGraph, dict: PdfDict, key: string): PdfDict | null {
  const value = dict.entries.get(key);
  return value === undefined ? null : asDict(graph.resolve(value));
}

function finding(location: string, objectId: ObjectId | undefined): Finding {
  return objectId ? { location, objectId } : { location };
}
