/**
 * The view of a document that the action engine works on.
 *
 * Nodes reached through an indirect reference have an ObjectId; nodes
 * embedded directly in their parent have none and are visited every time
 * they are reached.
 */

import type { PdfObject, PdfRef } from '../parser/types.js';
import { isRef } from '../parser/types.js';

export interface ObjectId {
  readonly objNum: number;
  readonly gen: number;
}

export interface ObjectGraph {
  /** The document catalog, normally as the trailer's reference to it */
  readonly root: PdfObject;
  /** Page objects in document order, normally references */
  readonly pages: readonly PdfObject[];
  /** Follow indirect references; anything unresolvable becomes null */
  resolve(obj: PdfObject): PdfObject;
}

/** A node with its references followed, and the identity it was reached by */
export interface Resolved {
  readonly node: PdfObject;
  readonly id?: ObjectId;
}

export function objectIdOf(obj: PdfObject): ObjectId | undefined {
  return isRef(obj) ? { objNum: obj.objNum, gen: obj.gen } : undefined;
}

export function objectKey(id: ObjectId | PdfRef): string {
  return `${id.objNum} ${id.gen}`;
}

/**
 * Identities seen during one traversal. `enter` answers whether the node
 * still has to be visited, and records it if so.
 */
export class VisitedSet {
  private readonly keys = new Set<string>();

  enter(id: ObjectId): boolean {
    const key = objectKey(id);
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    return true;
  }

  has(id: ObjectId): boolean {
    return this.keys.has(objectKey(id));
  }

  get size(): number {
    return this.keys.size;
  }
}

export function deref(graph: ObjectGraph, obj: PdfObject): Resolved {
  const id = objectIdOf(obj);
  return id ? { node: graph.resolve(obj), id } : { node: obj };
}
