/**
 * Route Tree Utilities
 *
 * Building RouteNode trees from definitions and paths, and listing the
 * routes a tree can dispatch to.
 */

import type { HandlerMap, RouteHandler, RouteTreeDefinition } from '../type/route.type.ts';
import { DuplicateKeyError, UnknownHandlerError } from '../type/error.type.ts';
import { RouteNode } from './route.node.ts';
import { SegmentCursor, SEPARATOR } from './segment.cursor.ts';

/** A handler-bearing node and the path that dispatches to it. */
export interface RouteEntry {
  readonly path: string;
  readonly node: RouteNode;
}

function resolveHandler(name: string | undefined, handlers: HandlerMap): RouteHandler | null {
  if (name === undefined) return null;
  if (!Object.hasOwn(handlers, name)) {
    throw new UnknownHandlerError(name);
  }
  return handlers[name];
}

/**
 * Convert a RouteTreeDefinition into a RouteNode tree.
 * Handler names are looked up in `handlers`. Child keys are trimmed, and two
 * keys that trim to the same value (e.g. "a" and " a") throw DuplicateKeyError.
 */
export function buildRouteTree(
  rootKey: string,
  definition: RouteTreeDefinition,
  handlers: HandlerMap,
): RouteNode {
  const node = new RouteNode(rootKey, resolveHandler(definition.handler, handlers));

  if (definition.children) {
    for (const [key, child] of Object.entries(definition.children)) {
      const childNode = buildRouteTree(key, child, handlers);
      if (node.hasChild(childNode.key)) {
        throw new DuplicateKeyError(node.key, childNode.key);
      }
      node.addChild(childNode);
    }
  }

  return node;
}

/**
 * Attach `handler` at `path` below `root`, creating missing intermediate nodes.
 * Segments are matched by their trimmed key, the key RouteNode stores.
 * An empty path ("/") sets the handler on `root` itself.
 */
export function mountRoute(root: RouteNode, path: string, handler: RouteHandler): RouteNode {
  let node = root;
  for (const segment of new SegmentCursor(path)) {
    node = node.getChild(segment.trim()) ?? new RouteNode(segment, null, node);
  }
  node.setHandler(handler);
  return node;
}

/** Every node with a handler, depth-first in child insertion order, root first. */
export function listRoutes(root: RouteNode): RouteEntry[] {
  const entries: RouteEntry[] = [];

  const visit = (node: RouteNode, keys: string[]): void => {
    if (node.hasHandler()) {
      entries.push({ path: SEPARATOR + keys.join(SEPARATOR), node });
    }
    for (const child of node) {
      visit(child, [...keys, child.key]);
    }
  };

  visit(root, []);
  return entries;
}
