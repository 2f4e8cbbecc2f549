/**
 * @module @plugwork/plugin-runtime/__tests__/context-stack.test.ts
 * Scoping rules of the plugin context stack and wrapped callbacks
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { ContextMismatchError } from '@plugwork/plugin-contracts';
import { PluginContextStack } from '../context/context-stack.js';
import { PluginWrapCache } from '../context/wrap-cache.js';

interface Entry {
  id: string;
}

describe('PluginContextStack', () => {
  let stack: PluginContextStack<Entry>;
  const a: Entry = { id: 'a' };
  const b: Entry = { id: 'b' };

  beforeEach(() => {
    stack = new PluginContextStack<Entry>();
  });

  describe('push / pop / peek', () => {
    it('should be empty initially', () => {
      expect(stack.peek()).toBeUndefined();
      expect(stack.depth).toBe(0);
    });

    it('should pop in reverse push order', () => {
      stack.push(a);
      stack.push(b);

      expect(stack.peek()).toBe(b);
      expect(stack.pop()).toBe(b);
      expect(stack.pop()).toBe(a);
      expect(stack.depth).toBe(0);
    });

    it('should refuse to pop an empty stack', () => {
      expect(() => stack.pop()).toThrow(ContextMismatchError);
    });
  });

  describe('run', () => {
    it('should hold the entry for the extent of the call', () => {
      const result = stack.run(a, () => stack.peek()?.id);

      expect(result).toBe('a');
      expect(stack.peek()).toBeUndefined();
    });

    it('should pop the entry when the callback throws', () => {
      expect(() =>
        stack.run(a, () => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(stack.depth).toBe(0);
    });

    it('should unwind nested scopes in reverse order', () => {
      const seen: Array<string | undefined> = [];

      stack.run(a, () => {
        seen.push(stack.peek()?.id);
        stack.run(b, () => {
          seen.push(stack.peek()?.id);
          expect(stack.depth).toBe(2);
        });
        seen.push(stack.peek()?.id);
      });
      seen.push(stack.peek()?.id);

      expect(seen).toEqual(['a', 'b', 'a', undefined]);
    });

    it('should allow re-entering the same entry', () => {
      const depths = stack.run(a, () => stack.run(a, () => stack.depth));
      expect(depths).toBe(2);
      expect(stack.depth).toBe(0);
    });

    it('should keep the entry across awaits of an async callback', async () => {
      const result = await stack.run(a, async () => {
        await delay(1);
        return stack.peek()?.id;
      });

      expect(result).toBe('a');
      expect(stack.depth).toBe(0);
    });

    it('should pop the entry when an async callback rejects', async () => {
      await expect(
        stack.run(a, async () => {
          await delay(1);
          throw new Error('async boom');
        })
      ).rejects.toThrow('async boom');
      expect(stack.depth).toBe(0);
    });

    it('should isolate concurrent scopes', async () => {
      const observed: Array<[string, string | undefined]> = [];

      await Promise.all([
        stack.run(a, async () => {
          await delay(10);
          observed.push(['a', stack.peek()?.id]);
        }),
        stack.run(b, async () => {
          await delay(1);
          observed.push(['b', stack.peek()?.id]);
          await delay(15);
          observed.push(['b', stack.peek()?.id]);
        }),
      ]);

      expect(observed).toEqual([
        ['b', 'b'],
        ['a', 'a'],
        ['b', 'b'],
      ]);
    });

    it('should see the caller entries below its own', () => {
      const below = stack.run(a, () =>
        stack.run(b, () => {
          const top = stack.pop();
          const next = stack.peek();
          stack.push(top);
          return next?.id;
        })
      );
      expect(below).toBe('a');
    });

    it('should detect a scope exited out of order', () => {
      expect(() =>
        stack.run(a, () => {
          stack.push(b);
        })
      ).toThrow(ContextMismatchError);
    });
  });
});

describe('PluginWrapCache', () => {
  let stack: PluginContextStack<Entry>;
  let cache: PluginWrapCache<Entry>;
  const a: Entry = { id: 'a' };
  const b: Entry = { id: 'b' };

  beforeEach(() => {
    stack = new PluginContextStack<Entry>();
    cache = new PluginWrapCache(stack);
  });

  it('should return the same wrapper for the same plugin and callback', () => {
    const handler = (): void => {};

    expect(cache.wrap(a, handler)).toBe(cache.wrap(a, handler));
    expect(cache.has(a, handler)).toBe(true);
  });

  it('should return distinct wrappers for distinct plugins', () => {
    const handler = (): void => {};

    expect(cache.wrap(a, handler)).not.toBe(cache.wrap(b, handler));
    expect(cache.has(b, () => {})).toBe(false);
  });

  it('should run the callback later with the plugin pushed', () => {
    const wrapped = cache.wrap(a, (x: number, y: number) => `${stack.peek()?.id}:${x + y}`);

    expect(stack.peek()).toBeUndefined();
    expect(wrapped(1, 2)).toBe('a:3');
    expect(stack.peek()).toBeUndefined();
  });

  it('should nest inside an outer scope', () => {
    const wrapped = cache.wrap(b, () => stack.depth);

    expect(stack.run(a, () => wrapped())).toBe(2);
  });
});
