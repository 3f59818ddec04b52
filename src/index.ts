/**
 * branchroute
 *
 * Hierarchical router: a path is split into segments, walked down a tree of
 * named nodes, and the handler on the node it ends at is run.
 */

// Types
export type {
  FailureHandler,
  HandlerMap,
  RouteHandler,
  RouterOptions,
  RouteTreeDefinition,
} from './type/route.type.ts';

export {
  ChildKeyMismatchError,
  ChildNotFoundError,
  DuplicateKeyError,
  EmptyKeyError,
  InvalidChildError,
  InvalidRouteError,
  InvalidSegmentError,
  NoHandlerError,
  NodeNotInTreeError,
  RouteError,
  RouteNotFoundError,
  RouterError,
  type RouterErrorCode,
  SelfReferenceError,
  UnknownHandlerError,
} from './type/error.type.ts';

// Routing
export { SegmentCursor } from './route/segment.cursor.ts';
export { RouteNode } from './route/route.node.ts';
export { RouteTree } from './route/route.tree.ts';
export { type CallableRouter, createRouter, type RouteTarget, Router } from './route/router.ts';
export {
  buildRouteTree,
  listRoutes,
  mountRoute,
  type RouteEntry,
} from './route/route-tree.util.ts';

// Logging
export { type Logger, setLogger } from './type/logger.type.ts';
export { debug } from './util/logger.util.ts';
