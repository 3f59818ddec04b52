/**
 * Segment Cursor
 *
 * Splits a path into non-empty segments and hands them out one at a time.
 * Leading, trailing and repeated slashes produce no empty segments, so
 * "/auth//login/" and "auth/login" yield the same cursor.
 *
 *   const cursor = new SegmentCursor('/auth/login/edit');
 *   while (cursor.hasNext()) console.log(cursor.next());
 *   // auth, login, edit
 */

import { InvalidSegmentError } from '../type/error.type.ts';

export const SEPARATOR = '/';

function splitPath(path: string): string[] {
  return path.split(SEPARATOR).filter((segment) => segment.length > 0);
}

export class SegmentCursor implements Iterable<string> {
  private readonly parts: readonly string[];
  private cursor = 0;

  /** The string this cursor was built from; the canonical path for fromSegments. */
  readonly rawPath: string;

  constructor(path = '') {
    this.rawPath = path;
    this.parts = splitPath(path);
  }

  /**
   * Build a cursor from ready-made segments, e.g. when synthesizing paths.
   * The segments are kept as given.
   *
   * @throws InvalidSegmentError for an empty segment or one containing "/".
   */
  static fromSegments(segments: readonly string[]): SegmentCursor {
    for (const segment of segments) {
      if (segment === '' || segment.includes(SEPARATOR)) {
        throw new InvalidSegmentError(segment);
      }
    }
    return new SegmentCursor(SEPARATOR + segments.join(SEPARATOR));
  }

  /** All segments, consumed or not. */
  get segments(): readonly string[] {
    return this.parts;
  }

  get length(): number {
    return this.parts.length;
  }

  /** 0-based index of the next segment to consume. */
  get position(): number {
    return this.cursor;
  }

  hasNext(): boolean {
    return this.cursor < this.parts.length;
  }

  /** Return the current segment and advance, or undefined when exhausted. */
  next(): string | undefined {
    return this.hasNext() ? this.parts[this.cursor++] : undefined;
  }

  /** Peek at the current segment without advancing. */
  current(): string | undefined {
    return this.parts[this.cursor];
  }

  reset(): this {
    this.cursor = 0;
    return this;
  }

  /** Drain every unconsumed segment. Leaves the cursor at the end. */
  remainingSegments(): string[] {
    const rest = this.parts.slice(this.cursor);
    this.cursor = this.parts.length;
    return rest;
  }

  /** Canonical form: "/" followed by the segments joined with "/". */
  toString(): string {
    return SEPARATOR + this.parts.join(SEPARATOR);
  }

  equals(other: SegmentCursor): boolean {
    return this.toString() === other.toString();
  }

  /** Consumes the cursor as it iterates. */
  *[Symbol.iterator](): Iterator<string> {
    for (let segment = this.next(); segment !== undefined; segment = this.next()) {
      yield segment;
    }
  }
}
