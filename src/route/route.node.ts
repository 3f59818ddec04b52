/**
 * Route Node
 *
 * A named junction in the routing tree. Each node owns its children (keyed by
 * their own key, iterated in insertion order) and may carry a handler that
 * runs when a dispatch ends on it.
 *
 * The parent link is a back-reference used only to rebuild paths upward; it
 * is kept in sync by addChild/removeChild, so a node is never listed under
 * two parents at once.
 *
 *   const auth = new RouteNode('auth');
 *   const login = new RouteNode('login', () => 'login page', auth);
 *   auth.getChild('login') === login; // true
 */

import { randomUUID } from 'node:crypto';
import type { RouteHandler } from '../type/route.type.ts';
import {
  ChildKeyMismatchError,
  ChildNotFoundError,
  EmptyKeyError,
  InvalidChildError,
  NoHandlerError,
  SelfReferenceError,
} from '../type/error.type.ts';

export class RouteNode implements Iterable<RouteNode> {
  /** Key under which the parent stores this node. Trimmed, never empty. */
  readonly key: string;

  /** Distinguishes nodes that share a key. */
  readonly id: string = randomUUID();

  private readonly childMap = new Map<string, RouteNode>();
  private parentNode: RouteNode | undefined;
  private handler: RouteHandler | null;

  constructor(key: string, handler: RouteHandler | null = null, parent?: RouteNode) {
    const trimmed = key.trim();
    if (trimmed === '') {
      throw new EmptyKeyError();
    }
    this.key = trimmed;
    this.handler = handler;
    parent?.addChild(this);
  }

  get parent(): RouteNode | undefined {
    return this.parentNode;
  }

  get childCount(): number {
    return this.childMap.size;
  }

  // ── Children ──────────────────────────────────────────────────────────

  /**
   * Attach a child under its own key.
   *
   * The child leaves its previous parent, and a node already stored under the
   * same key is replaced and loses its parent link.
   */
  addChild(child: RouteNode): void {
    if (child === this) {
      throw new SelfReferenceError(this.key);
    }
    for (let ancestor = this.parentNode; ancestor; ancestor = ancestor.parentNode) {
      if (ancestor === child) {
        throw new SelfReferenceError(this.key, true);
      }
    }

    child.parentNode?.release(child);

    const previous = this.childMap.get(child.key);
    if (previous && previous !== child) {
      previous.parentNode = undefined;
    }

    this.childMap.set(child.key, child);
    child.parentNode = this;
  }

  /**
   * Attach several children in order.
   * Stops at the first value that is not a RouteNode; earlier ones stay attached.
   */
  addChildren(children: Iterable<unknown>): void {
    for (const child of children) {
      if (!(child instanceof RouteNode)) {
        throw new InvalidChildError(child);
      }
      this.addChild(child);
    }
  }

  /** Indexed assignment: `key` must be the child's own key. */
  setChild(key: string, value: unknown): void {
    if (!(value instanceof RouteNode)) {
      throw new InvalidChildError(value);
    }
    if (key !== value.key) {
      throw new ChildKeyMismatchError(key, value.key);
    }
    this.addChild(value);
  }

  getChild(key: string): RouteNode | undefined {
    return this.childMap.get(key);
  }

  hasChild(key: string): boolean {
    return this.childMap.has(key);
  }

  /** Detach and return the child stored under `key`. */
  removeChild(key: string): RouteNode {
    const child = this.detachChild(key);
    if (!child) {
      throw new ChildNotFoundError(this.key, key);
    }
    return child;
  }

  /** Like removeChild, but returns undefined when there is no such child. */
  detachChild(key: string): RouteNode | undefined {
    const child = this.childMap.get(key);
    if (!child) return undefined;
    this.childMap.delete(key);
    child.parentNode = undefined;
    return child;
  }

  children(): IterableIterator<RouteNode> {
    return this.childMap.values();
  }

  childKeys(): string[] {
    return [...this.childMap.keys()];
  }

  isLeaf(): boolean {
    return this.childMap.size === 0;
  }

  [Symbol.iterator](): IterableIterator<RouteNode> {
    return this.childMap.values();
  }

  // ── Handler ───────────────────────────────────────────────────────────

  setHandler(handler: RouteHandler | null): void {
    this.handler = handler;
  }

  getHandler(): RouteHandler | null {
    return this.handler;
  }

  hasHandler(): boolean {
    return this.handler !== null;
  }

  /** Run the handler with `args`. Errors thrown by the handler propagate as-is. */
  execute(...args: unknown[]): unknown {
    if (this.handler === null) {
      throw new NoHandlerError(this.key);
    }
    return this.handler(...args);
  }

  toString(): string {
    return this.key;
  }

  /** Drop `child` from this node's map if it is still the occupant of its key. */
  private release(child: RouteNode): void {
    if (this.childMap.get(child.key) === child) {
      this.childMap.delete(child.key);
    }
    child.parentNode = undefined;
  }
}
