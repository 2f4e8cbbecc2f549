/**
 * @module @plugwork/plugin-runtime/plugin
 * Base class of every plugin.
 */

import type { EventEmitter } from 'node:events';
import type { PluginDescriptor, PluginIdentity } from '@plugwork/plugin-contracts';
import type { PluginEngine } from './engine/plugin-engine.js';
import { splitDocstring } from './utils/docstring.js';

/**
 * Constructor side of a plugin: the value a loader materializes.
 */
export interface PluginClass<TPlugin extends Plugin = Plugin> {
  new (engine: PluginEngine, descriptor: PluginDescriptor<PluginClass<TPlugin>>): TPlugin;
  readonly prototype: TPlugin;
  readonly name: string;
  readonly requiredPlugins: readonly string[];
  readonly usedPlugins: readonly string[];
  readonly version?: string;
  readonly doc?: string;
}

/**
 * Extend this class and register the subclass with a loader.
 *
 * @example
 * ```typescript
 * export class MilkPlugin extends Plugin {
 *   static override doc = `Milk
 *
 *     Steamed milk for every coffee`;
 *   static override requiredPlugins = ['espresso'];
 *   static override usedPlugins = ['sugar'];
 *
 *   override init(): void {
 *     this.connect(orders, 'placed', this.onOrder);
 *   }
 * }
 * ```
 */
export class Plugin implements PluginIdentity {
  /** Plugins that must be loaded before this one */
  static requiredPlugins: readonly string[] = [];
  /** Plugins loaded before this one when available */
  static usedPlugins: readonly string[] = [];
  /** Explicit plugin version; defaults to the package version */
  static version?: string;
  /** Documentation: first line is the title, the rest the description */
  static doc?: string;

  /**
   * Required plugins of this class merged with `names`, for subclasses
   * that add to an inherited declaration.
   */
  static depends(...names: string[]): readonly string[] {
    return [...new Set([...this.requiredPlugins, ...names])];
  }

  /**
   * Used plugins of this class merged with `names`.
   */
  static uses(...names: string[]): readonly string[] {
    return [...new Set([...this.usedPlugins, ...names])];
  }

  readonly engine: PluginEngine;
  readonly name: string;
  readonly packageName: string;
  readonly packageVersion: string;
  readonly version: string;
  readonly rootPath: string;
  readonly title: string;
  readonly description: string;

  constructor(engine: PluginEngine, descriptor: PluginDescriptor<PluginClass>) {
    this.engine = engine;
    this.name = descriptor.name;
    this.packageName = descriptor.packageName;
    this.packageVersion = descriptor.packageVersion;
    this.version = descriptor.version;
    this.rootPath = descriptor.rootPath;

    const { title, description } = splitDocstring(descriptor.implementation.doc);
    this.title = title;
    this.description = description;
  }

  /**
   * Initializes the plugin at application startup.
   *
   * Called once by the engine, inside the host scope and with this plugin on
   * the context stack. Override it if you need initialization.
   */
  init(): void | Promise<void> {}

  /**
   * Run `fn` with this plugin on the context stack.
   */
  pluginContext<R>(fn: () => R): R {
    return this.engine.contextStack.run(this, fn);
  }

  /**
   * Subscribe `listener` to `event`; it runs in this plugin's context.
   */
  connect<A extends unknown[]>(emitter: EventEmitter, event: string | symbol, listener: (...args: A) => void): this {
    emitter.on(event, this.engine.wrapInPluginContext(this, listener));
    return this;
  }

  disconnect<A extends unknown[]>(emitter: EventEmitter, event: string | symbol, listener: (...args: A) => void): this {
    emitter.off(event, this.engine.wrapInPluginContext(this, listener));
    return this;
  }

  toString(): string {
    return `<${this.constructor.name}(${this.name})>`;
  }
}

/**
 * Whether `value` is `base` or one of its subclasses.
 */
export function isPluginClass<TPlugin extends Plugin>(value: unknown, base: PluginClass<TPlugin>): value is PluginClass<TPlugin> {
  return typeof value === 'function' && (value === base || value.prototype instanceof base);
}
