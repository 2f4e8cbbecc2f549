/**
 * @module @plugwork/plugin-runtime/context/wrap-cache
 * Callbacks bound to a plugin context
 */

import type { PluginContextStack } from './context-stack.js';

/**
 * Produces wrappers that run a callback with a plugin on the context stack.
 *
 * Wrappers are cached per (plugin, callback) pair, so wrapping the same pair
 * again yields the same function and identity-based de-duplication (or
 * `emitter.off`) keeps working. Entries live as long as both keys do.
 */
export class PluginWrapCache<TPlugin extends object> {
  private readonly wrappers = new WeakMap<TPlugin, WeakMap<object, object>>();

  constructor(private readonly stack: PluginContextStack<TPlugin>) {}

  wrap<A extends unknown[], R>(plugin: TPlugin, fn: (...args: A) => R): (...args: A) => R {
    let byCallback = this.wrappers.get(plugin);
    if (!byCallback) {
      byCallback = new WeakMap();
      this.wrappers.set(plugin, byCallback);
    }

    const cached = byCallback.get(fn);
    if (cached) {
      return cached as (...args: A) => R;
    }

    const wrapped = (...args: A): R => this.stack.run(plugin, () => fn(...args));
    byCallback.set(fn, wrapped);
    return wrapped;
  }

  has(plugin: TPlugin, fn: object): boolean {
    return this.wrappers.get(plugin)?.has(fn) ?? false;
  }
}
