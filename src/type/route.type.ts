/**
 * Router Types
 *
 * Handlers are opaque to the router: it never inspects their arguments or
 * return values.
 */

import type { RouteError } from './error.type.ts';

/** Callable attached to a route node. */
export type RouteHandler = (...args: unknown[]) => unknown;

/** Receives router-taxonomy errors instead of the caller; its result becomes the dispatch result. */
export type FailureHandler = (error: RouteError) => unknown;

/** Options for Router and createRouter. */
export interface RouterOptions {
  /** Called with RouteNotFoundError / InvalidRouteError instead of throwing them. */
  failureHandler?: FailureHandler | null;
}

/**
 * JSON-serializable description of a route tree.
 *
 * Handlers are referenced by name and resolved against a HandlerMap when the
 * tree is built, so a definition can live in a config file.
 */
export interface RouteTreeDefinition {
  /** Name of the handler in the HandlerMap. */
  handler?: string;

  /** Children keyed by path segment (e.g. "login", "dashboard"). */
  children?: Record<string, RouteTreeDefinition>;
}

/** Named handlers referenced from a RouteTreeDefinition. */
export type HandlerMap = Readonly<Record<string, RouteHandler>>;
