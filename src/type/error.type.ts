/**
 * Error Types
 *
 * Every error raised by branchroute extends RouterError and carries a
 * machine-readable code. Only RouteError subclasses (the router taxonomy)
 * are handed to a router's failure handler.
 */

export type RouterErrorCode =
  | 'EMPTY_KEY'
  | 'SELF_REFERENCE'
  | 'INVALID_CHILD'
  | 'CHILD_NOT_FOUND'
  | 'CHILD_KEY_MISMATCH'
  | 'NO_HANDLER'
  | 'NODE_NOT_IN_TREE'
  | 'UNKNOWN_HANDLER'
  | 'DUPLICATE_KEY'
  | 'INVALID_SEGMENT'
  | 'ROUTE_NOT_FOUND'
  | 'INVALID_ROUTE';

export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: RouterErrorCode,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ── Node ──────────────────────────────────────────────────────────────

export class EmptyKeyError extends RouterError {
  constructor() {
    super('Node key must not be empty', 'EMPTY_KEY');
  }
}

export class SelfReferenceError extends RouterError {
  constructor(
    public readonly key: string,
    ancestor = false,
  ) {
    super(
      ancestor
        ? `Node "${key}" cannot adopt one of its own ancestors`
        : `Node "${key}" cannot be its own child`,
      'SELF_REFERENCE',
    );
  }
}

export class InvalidChildError extends RouterError {
  constructor(public readonly value: unknown) {
    super(`Only RouteNode instances can be added as children, got ${describe(value)}`, 'INVALID_CHILD');
  }
}

export class ChildNotFoundError extends RouterError {
  constructor(
    public readonly parentKey: string,
    public readonly childKey: string,
  ) {
    super(`Node "${parentKey}" has no child "${childKey}"`, 'CHILD_NOT_FOUND');
  }
}

export class ChildKeyMismatchError extends RouterError {
  constructor(
    public readonly expectedKey: string,
    public readonly childKey: string,
  ) {
    super(
      `Cannot store node "${childKey}" under key "${expectedKey}": keys must match`,
      'CHILD_KEY_MISMATCH',
    );
  }
}

export class NoHandlerError extends RouterError {
  constructor(public readonly key: string) {
    super(`Node "${key}" has no handler`, 'NO_HANDLER');
  }
}

// ── Tree ──────────────────────────────────────────────────────────────

export class NodeNotInTreeError extends RouterError {
  constructor(
    public readonly key: string,
    public readonly stopKey: string,
  ) {
    super(`Node "${key}" is not under the specified stop node "${stopKey}"`, 'NODE_NOT_IN_TREE');
  }
}

export class UnknownHandlerError extends RouterError {
  constructor(public readonly handlerName: string) {
    super(`No handler registered under "${handlerName}"`, 'UNKNOWN_HANDLER');
  }
}

export class DuplicateKeyError extends RouterError {
  constructor(
    public readonly parentKey: string,
    public readonly key: string,
  ) {
    super(`Node "${parentKey}" defines child "${key}" more than once`, 'DUPLICATE_KEY');
  }
}

// ── Cursor ────────────────────────────────────────────────────────────

export class InvalidSegmentError extends RouterError {
  constructor(public readonly segment: string) {
    super(
      segment === ''
        ? 'Path segments must not be empty'
        : `Path segment "${segment}" must not contain "/"`,
      'INVALID_SEGMENT',
    );
  }
}

// ── Router ────────────────────────────────────────────────────────────

/** Base of the errors a router may hand to its failure handler. */
export class RouteError extends RouterError {
  constructor(
    message: string,
    code: 'ROUTE_NOT_FOUND' | 'INVALID_ROUTE',
    public readonly path: string,
  ) {
    super(message, code);
  }
}

export class RouteNotFoundError extends RouteError {
  constructor(
    path: string,
    public readonly segment: string,
    public readonly matchedKeys: readonly string[],
  ) {
    super(`No route for ${path}: segment "${segment}" has no match`, 'ROUTE_NOT_FOUND', path);
  }
}

export class InvalidRouteError extends RouteError {
  constructor(path: string) {
    super(`Route ${path} exists but has no handler`, 'INVALID_ROUTE', path);
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
