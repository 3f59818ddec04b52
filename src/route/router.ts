/**
 * Router
 *
 * Matches a path against a RouteTree one segment at a time and runs the
 * handler of the node the path ends on.
 *
 * Two failures belong to the router itself:
 * - RouteNotFoundError: a segment has no matching child.
 * - InvalidRouteError: the path ends on a node without a handler.
 *
 * When a failure handler is set, these two are passed to it and its return
 * value becomes the dispatch result. Anything a route handler throws reaches
 * the caller untouched, failure handler or not.
 *
 *   const router = createRouter(tree, { failureHandler: (e) => `404 ${e.path}` });
 *   router('/login');
 */

import type { FailureHandler, RouterOptions } from '../type/route.type.ts';
import { InvalidRouteError, RouteError, RouteNotFoundError } from '../type/error.type.ts';
import { logger } from '../type/logger.type.ts';
import { debug } from '../util/logger.util.ts';
import { RouteNode } from './route.node.ts';
import { RouteTree } from './route.tree.ts';
import { SegmentCursor } from './segment.cursor.ts';

/** A path string or a cursor over one. Cursors are consumed, not reset. */
export type RouteTarget = SegmentCursor | string;

function toCursor(target: RouteTarget): SegmentCursor {
  return typeof target === 'string' ? new SegmentCursor(target) : target;
}

export class Router {
  tree: RouteTree;
  failureHandler: FailureHandler | null;

  constructor(tree: RouteTree, options: RouterOptions = {}) {
    this.tree = tree;
    this.failureHandler = options.failureHandler ?? null;
  }

  /**
   * Walk the tree along `target` and return the node it ends on.
   *
   * The tree's active node is reset to the root first. An empty path matches
   * the root itself.
   *
   * @throws RouteNotFoundError when a segment has no matching child.
   * @throws InvalidRouteError when the final node has no handler.
   */
  match(target: RouteTarget): RouteNode {
    const cursor = toCursor(target);
    if (cursor.position > 0) {
      logger.warn(
        `Matching ${cursor.toString()} from segment ${cursor.position}; ` +
          `call reset() on the cursor to match the whole path`,
      );
    }
    const tree = this.tree;
    tree.resetActiveNode();

    let node = tree.getRootNode();
    const matchedKeys: string[] = [];

    for (let segment = cursor.next(); segment !== undefined; segment = cursor.next()) {
      const child = tree.stepToChild(segment);
      if (!child) {
        // An absent active node never outlives the dispatch.
        tree.resetActiveNode();
        throw new RouteNotFoundError(cursor.toString(), segment, matchedKeys);
      }
      matchedKeys.push(segment);
      node = child;
    }

    if (!node.hasHandler()) {
      throw new InvalidRouteError(cursor.toString());
    }

    return node;
  }

  /**
   * Match `target` and run the handler of the matched node with no arguments.
   * Returns whatever the handler returns (a promise is passed through as-is).
   */
  dispatch(target: RouteTarget): unknown {
    const cursor = toCursor(target);
    const path = cursor.toString();

    let node: RouteNode;
    try {
      node = this.match(cursor);
    } catch (error) {
      if (error instanceof RouteError && this.failureHandler) {
        logger.error(`Route failure for ${path} delegated to failure handler`, error);
        debug.dispatch('delegated', path, error.code);
        return this.failureHandler(error);
      }
      debug.dispatch('failed', path, error instanceof RouteError ? error.code : undefined);
      throw error;
    }

    debug.dispatch('matched', path, node.key);
    return node.execute();
  }
}

/** Router that can be called directly as a shorthand for dispatch. */
export type CallableRouter = ((target: RouteTarget) => unknown) & {
  readonly router: Router;
};

/** Create a router over a tree (or over a bare root node) and return it in callable form. */
export function createRouter(tree: RouteTree | RouteNode, options?: RouterOptions): CallableRouter {
  const router = new Router(tree instanceof RouteNode ? new RouteTree(tree) : tree, options);
  return Object.assign((target: RouteTarget) => router.dispatch(target), { router });
}
