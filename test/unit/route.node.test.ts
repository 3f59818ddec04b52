import { describe, expect, test, vi } from 'vitest';
import { RouteNode } from '../../src/route/route.node.ts';
import {
  ChildKeyMismatchError,
  ChildNotFoundError,
  EmptyKeyError,
  InvalidChildError,
  NoHandlerError,
  RouterError,
  SelfReferenceError,
} from '../../src/type/error.type.ts';
import { catchError } from './test.util.ts';

describe('RouteNode', () => {
  describe('construction', () => {
    test('trims the key', () => {
      expect(new RouteNode('  login ').key).toBe('login');
    });

    test('rejects blank keys', () => {
      expect(() => new RouteNode('')).toThrow(EmptyKeyError);
      expect(() => new RouteNode('   ')).toThrow(EmptyKeyError);
    });

    test('attaches to an initial parent', () => {
      const root = new RouteNode('root');
      const child = new RouteNode('child', null, root);
      expect(child.parent).toBe(root);
      expect(root.getChild('child')).toBe(child);
    });

    test('nodes sharing a key get distinct ids', () => {
      expect(new RouteNode('a').id).not.toBe(new RouteNode('a').id);
    });

    test('toString is the key', () => {
      expect(String(new RouteNode('dashboard'))).toBe('dashboard');
    });
  });

  describe('children', () => {
    test('addChildren attaches every node', () => {
      const root = new RouteNode('root');
      const node1 = new RouteNode('node_1');
      const node2 = new RouteNode('node_2');

      root.addChildren([node1, node2]);

      expect(root.getChild('node_1')).toBe(node1);
      expect(root.getChild('node_2')).toBe(node2);
      expect(root.childCount).toBe(2);
    });

    test('addChildren stops at the first non-node without rolling back', () => {
      const root = new RouteNode('root');
      const first = new RouteNode('first');
      const last = new RouteNode('last');

      const error = catchError(() => root.addChildren([first, 'not a node', last]));

      expect(error).toBeInstanceOf(InvalidChildError);
      expect(root.childKeys()).toEqual(['first']);
      expect(last.parent).toBeUndefined();
    });

    test('a node cannot be its own child', () => {
      const root = new RouteNode('root');
      expect(() => root.addChild(root)).toThrow(SelfReferenceError);
      expect(root.isLeaf()).toBe(true);
    });

    test('a node cannot adopt an ancestor', () => {
      const root = new RouteNode('root');
      const child = new RouteNode('child', null, root);
      const grandChild = new RouteNode('grandChild', null, child);

      const error = catchError(() => grandChild.addChild(root));

      expect(error).toBeInstanceOf(SelfReferenceError);
      expect(root.parent).toBeUndefined();
    });

    test('a colliding key replaces the occupant and clears its parent', () => {
      const root = new RouteNode('root');
      const first = new RouteNode('child');
      const second = new RouteNode('child');

      root.addChild(first);
      root.addChild(second);

      expect(root.getChild('child')).toBe(second);
      expect(first.parent).toBeUndefined();
      expect(root.childCount).toBe(1);
    });

    test('moving a child detaches it from the previous parent', () => {
      const a = new RouteNode('a');
      const b = new RouteNode('b');
      const child = new RouteNode('child', null, a);

      b.addChild(child);

      expect(a.hasChild('child')).toBe(false);
      expect(b.getChild('child')).toBe(child);
      expect(child.parent).toBe(b);
    });

    test('moving a replaced node does not evict its successor', () => {
      const a = new RouteNode('a');
      const b = new RouteNode('b');
      const old = new RouteNode('x', null, a);
      const replacement = new RouteNode('x', null, a);

      b.addChild(old);

      expect(a.getChild('x')).toBe(replacement);
      expect(b.getChild('x')).toBe(old);
    });

    test('setChild requires a node stored under its own key', () => {
      const root = new RouteNode('root');
      const node = new RouteNode('test_node');

      expect(() => root.setChild('node', node)).toThrow(ChildKeyMismatchError);
      expect(() => root.setChild('x', 42)).toThrow(InvalidChildError);

      root.setChild('test_node', node);
      expect(root.getChild('test_node')).toBe(node);
    });

    test('removeChild detaches and returns the child', () => {
      const root = new RouteNode('root');
      const node = new RouteNode('node', null, root);

      expect(root.removeChild('node')).toBe(node);
      expect(root.getChild('node')).toBeUndefined();
      expect(root.childCount).toBe(0);
      expect(node.parent).toBeUndefined();
    });

    test('removeChild throws for an unknown key', () => {
      const error = catchError(() => new RouteNode('root').removeChild('node'));
      expect(error).toBeInstanceOf(ChildNotFoundError);
      expect(error).toBeInstanceOf(RouterError);
      expect(error).toMatchObject({ code: 'CHILD_NOT_FOUND', childKey: 'node' });
    });

    test('detachChild returns undefined for an unknown key', () => {
      expect(new RouteNode('root').detachChild('node')).toBeUndefined();
    });

    test('iterates children in insertion order', () => {
      const root = new RouteNode('root');
      root.addChildren([new RouteNode('b'), new RouteNode('a'), new RouteNode('c')]);

      expect([...root].map((child) => child.key)).toEqual(['b', 'a', 'c']);
      expect([...root.children()].map(String)).toEqual(['b', 'a', 'c']);
      expect(root.childKeys()).toEqual(['b', 'a', 'c']);
    });

    test('isLeaf reflects the child set', () => {
      const root = new RouteNode('root');
      expect(root.isLeaf()).toBe(true);
      new RouteNode('child', null, root);
      expect(root.isLeaf()).toBe(false);
    });
  });

  describe('handler', () => {
    test('execute returns the handler result', () => {
      const root = new RouteNode('root', () => true);
      expect(root.execute()).toBe(true);
    });

    test('execute forwards arguments', () => {
      const handler = vi.fn((...args: unknown[]) => args.length);
      const node = new RouteNode('node', handler);

      expect(node.execute('a', 2)).toBe(2);
      expect(handler).toHaveBeenCalledWith('a', 2);
    });

    test('execute without a handler throws', () => {
      const error = catchError(() => new RouteNode('root').execute());
      expect(error).toBeInstanceOf(NoHandlerError);
      expect(error).toMatchObject({ message: 'Node "root" has no handler', key: 'root' });
    });

    test('handler errors propagate unchanged', () => {
      const failure = new Error('boom');
      const node = new RouteNode('node', () => {
        throw failure;
      });
      expect(catchError(() => node.execute())).toBe(failure);
    });

    test('setHandler replaces and clears', () => {
      const node = new RouteNode('node', () => 1);
      node.setHandler(() => 2);
      expect(node.execute()).toBe(2);
      node.setHandler(null);
      expect(node.hasHandler()).toBe(false);
      expect(node.getHandler()).toBeNull();
    });
  });
});
