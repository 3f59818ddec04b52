/**
 * Route Tree
 *
 * Wraps a root RouteNode and tracks the active node: the current position of
 * a traversal. stepToChild moves it one level down; a miss leaves it absent
 * (undefined) rather than where it was, so callers can tell a dead end from a
 * successful step.
 *
 * The active node is mutable tree state. A tree serves one traversal at a
 * time; Router resets it at the start of every dispatch.
 */

import { NodeNotInTreeError } from '../type/error.type.ts';
import { debug } from '../util/logger.util.ts';
import type { RouteNode } from './route.node.ts';
import { SEPARATOR } from './segment.cursor.ts';

export class RouteTree {
  private rootNode: RouteNode;
  private activeNode: RouteNode | undefined;

  constructor(root: RouteNode) {
    this.rootNode = root;
    this.activeNode = root;
  }

  /**
   * Collect the keys from `node` up to `stopAt` (excluded), top to bottom.
   *
   * Without `stopAt` the walk runs to the top of the chain, so the topmost
   * ancestor's key is included. When `node` is `stopAt` the result is empty.
   *
   * @throws NodeNotInTreeError when `stopAt` is given but not an ancestor of `node`.
   */
  static pathKeys(node: RouteNode, stopAt?: RouteNode): string[] {
    const keys: string[] = [];
    let current: RouteNode | undefined = node;

    while (current && current !== stopAt) {
      keys.push(current.key);
      current = current.parent;
    }

    if (stopAt && current !== stopAt) {
      throw new NodeNotInTreeError(node.key, stopAt.key);
    }

    return keys.reverse();
  }

  getRootNode(): RouteNode {
    return this.rootNode;
  }

  /** Replace the root. Nodes reachable only from the old root stop being members. */
  setRootNode(root: RouteNode): void {
    this.rootNode = root;
    this.activeNode = root;
    debug.info('tree', `root replaced with "${root.key}"`);
  }

  /** Current traversal position; undefined after a failed step. */
  getActiveNode(): RouteNode | undefined {
    return this.activeNode;
  }

  resetActiveNode(): void {
    this.activeNode = this.rootNode;
  }

  /**
   * Move the active node to its child `key`.
   * Returns the new active node, or undefined (and clears the active node) on a miss.
   */
  stepToChild(key: string): RouteNode | undefined {
    const from = this.activeNode;
    this.activeNode = from?.getChild(key);
    debug.step(from?.key ?? '(none)', key, this.activeNode !== undefined);
    return this.activeNode;
  }

  /** Keys from the root (excluded) down to `node`. */
  getPathKeys(node: RouteNode): string[] {
    return RouteTree.pathKeys(node, this.rootNode);
  }

  /** Path that dispatches to `node`, e.g. "/dashboard/users". The root is "/". */
  getPath(node: RouteNode): string {
    return SEPARATOR + this.getPathKeys(node).join(SEPARATOR);
  }

  contains(node: RouteNode): boolean {
    if (node === this.rootNode) return true;
    try {
      this.getPathKeys(node);
      return true;
    } catch (error) {
      if (error instanceof NodeNotInTreeError) return false;
      throw error;
    }
  }
}
