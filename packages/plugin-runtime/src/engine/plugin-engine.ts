/**
 * @module @plugwork/plugin-runtime/engine/plugin-engine
 * Discovers, orders and instantiates the configured plugins.
 */

import {
  AmbiguousPluginError,
  ErrorCode,
  PluginContractError,
  PluginError,
  PluginMaterializeError,
  PluginNotFoundError,
  PluginsAlreadyLoadedError,
  ConfigError,
  toDependencySpec,
  wrapError,
  type HostScope,
  type PluginDescriptor,
  type PluginHandle,
  type PluginLoader,
  type PluginLogger,
  type PluginSignals,
} from '@plugwork/plugin-contracts';
import { namespaceSchema, parseConfig, pluginNamesSchema } from '../config/engine-config.js';
import { PluginContextStack, PluginWrapCache, pluginContextStack } from '../context/index.js';
import { EventEmitterPluginSignals } from '../events/plugin-signals.js';
import { createEngineLogger } from '../logging.js';
import { Plugin, isPluginClass, type PluginClass } from '../plugin.js';
import { resolveDependencies } from '../resolver/resolve-dependencies.js';
import { PluginEngineState, type EngineStatus } from './engine-state.js';

export interface PluginEngineOptions {
  loader: PluginLoader;
  namespace?: string;
  plugins?: readonly string[];
  logger?: PluginLogger;
  /** Scope acquired around each plugin's init hook */
  hostScope?: HostScope;
  /** Receives the "plugins loaded" announcement */
  signals?: PluginSignals;
  /** Defaults to the process-wide stack */
  contextStack?: PluginContextStack<Plugin>;
  /** Class every plugin must extend; defaults to {@link Plugin} */
  pluginClass?: PluginClass;
}

export interface LoadPluginsOptions {
  /**
   * Initialize the plugins that could be imported even if others could not.
   * @default true
   */
  skipFailed?: boolean;
}

const passThroughScope: HostScope = {
  async run(fn) {
    return fn();
  },
};

export class PluginEngine {
  readonly loader: PluginLoader;
  readonly logger: PluginLogger;
  readonly hostScope: HostScope;
  readonly signals: PluginSignals;
  readonly contextStack: PluginContextStack<Plugin>;
  readonly pluginClass: PluginClass;

  private readonly state = new PluginEngineState();
  private readonly wrapCache: PluginWrapCache<Plugin>;
  private namespace?: string;
  private pluginsToLoad: readonly string[] = [];

  constructor(options: PluginEngineOptions) {
    this.loader = options.loader;
    this.logger = options.logger ?? createEngineLogger(options.namespace ?? 'plugins');
    this.hostScope = options.hostScope ?? passThroughScope;
    this.signals = options.signals ?? new EventEmitterPluginSignals();
    this.contextStack = options.contextStack ?? pluginContextStack;
    this.pluginClass = options.pluginClass ?? Plugin;
    this.wrapCache = new PluginWrapCache(this.contextStack);

    if (options.namespace !== undefined) {
      this.configure(options.namespace, options.plugins ?? []);
    }
  }

  get status(): EngineStatus {
    return this.state.status(this.namespace !== undefined);
  }

  /**
   * Set the namespace plugins are looked up in and the names to load.
   * May be called any number of times before {@link loadPlugins}.
   *
   * @throws ConfigError on an empty namespace or empty/duplicate names
   * @throws PluginsAlreadyLoadedError once loading has started
   */
  configure(namespace: string, names: readonly string[]): this {
    if (this.state.loaded) {
      throw new PluginsAlreadyLoadedError();
    }
    this.namespace = parseConfig(namespaceSchema, namespace, 'plugin namespace');
    this.pluginsToLoad = parseConfig(pluginNamesSchema, names, 'plugin list');
    return this;
  }

  /**
   * Loads all configured plugins.
   *
   * Plugins are initialized one after another, each after the plugins it
   * depends on. Can only be called once per engine.
   *
   * @returns true if all plugins could be loaded, false otherwise
   * @throws PluginsAlreadyLoadedError when called a second time, whatever
   *   the outcome of the first call
   * @throws ConfigError when no namespace is configured; this uses up the
   *   single load
   * @throws UnresolvableDependencyGraphError when no load order exists;
   *   nothing is instantiated in that case
   */
  async loadPlugins(options: LoadPluginsOptions = {}): Promise<boolean> {
    const { skipFailed = true } = options;
    const state = this.state;
    if (state.loaded) {
      throw new PluginsAlreadyLoadedError();
    }
    state.loaded = true;
    const namespace = this.namespace;
    if (namespace === undefined) {
      state.aborted = true;
      throw new ConfigError('Plugin namespace is not configured');
    }

    try {
      const candidates = await this.importPlugins(namespace);
      if (state.failed.size > 0 && !skipFailed) {
        this.logger.warn('Not initializing plugins because some could not be imported', {
          failed: [...state.failed],
        });
        state.settled = true;
        return false;
      }

      const dependencies = new Map([...candidates].map(([name, descriptor]) => [name, toDependencySpec(descriptor)]));
      for (const name of resolveDependencies(dependencies)) {
        const descriptor = candidates.get(name);
        if (!descriptor) {
          throw new PluginError(`Resolved plugin ${name} is not a candidate`, ErrorCode.INTERNAL_ERROR, { plugin: name });
        }
        state.plugins.set(name, await this.instantiate(descriptor));
      }
    } catch (error) {
      state.aborted = true;
      this.logger.error('Loading plugins aborted', { code: wrapError(error).code, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }

    state.settled = true;
    this.logger.info('Plugins loaded', { loaded: state.plugins.size, failed: state.failed.size });
    this.signals.announcePluginsLoaded();
    return state.failed.size === 0;
  }

  /**
   * Names of the plugins which could not be loaded.
   */
  getFailedPlugins(): ReadonlySet<string> {
    return new Set(this.state.failed);
  }

  /**
   * Why each failed plugin could not be loaded.
   */
  getFailureReasons(): ReadonlyMap<string, PluginError> {
    return new Map(this.state.failures);
  }

  /**
   * The loaded plugins by name. The returned object is frozen.
   */
  getActivePlugins(): Readonly<Record<string, Plugin>> {
    return Object.freeze(Object.fromEntries(this.state.plugins));
  }

  hasPlugin(name: string): boolean {
    return this.state.plugins.has(name);
  }

  getPlugin(name: string): Plugin | undefined {
    return this.state.plugins.get(name);
  }

  /**
   * A function running `fn` in `plugin`'s context. Wrapping the same pair
   * twice returns the same function.
   */
  wrapInPluginContext<A extends unknown[], R>(plugin: Plugin, fn: (...args: A) => R): (...args: A) => R {
    return this.wrapCache.wrap(plugin, fn);
  }

  /**
   * Decorator-style variant of {@link wrapInPluginContext}.
   *
   * @example
   * ```typescript
   * const onOrder = engine.withPluginContext(plugin)((order: Order) => ...);
   * ```
   */
  withPluginContext(plugin: Plugin): <A extends unknown[], R>(fn: (...args: A) => R) => (...args: A) => R {
    return (fn) => this.wrapInPluginContext(plugin, fn);
  }

  toString(): string {
    return `<PluginEngine(${this.namespace ?? ''})>`;
  }

  /**
   * Imports the configured plugins.
   *
   * @returns descriptors of the plugins that could be imported, by name
   */
  private async importPlugins(namespace: string): Promise<Map<string, PluginDescriptor<PluginClass>>> {
    const descriptors = new Map<string, PluginDescriptor<PluginClass>>();

    for (const name of this.pluginsToLoad) {
      let handles: readonly PluginHandle[];
      try {
        handles = await this.loader.find(namespace, name);
      } catch (error) {
        this.fail(name, new PluginMaterializeError(name, error));
        continue;
      }
      const [handle] = handles;
      if (!handle) {
        this.fail(name, new PluginNotFoundError(name, namespace));
        continue;
      }
      if (handles.length > 1) {
        this.fail(name, new AmbiguousPluginError(name, handles.map((h) => h.source)));
        continue;
      }

      let implementation: unknown;
      let packageInfo;
      try {
        implementation = await this.loader.materialize(handle);
        packageInfo = await this.loader.packageInfo(handle);
      } catch (error) {
        this.fail(name, new PluginMaterializeError(name, error));
        continue;
      }

      if (!isPluginClass(implementation, this.pluginClass)) {
        this.fail(name, new PluginContractError(name, this.pluginClass.name));
        continue;
      }

      descriptors.set(name, {
        name,
        implementation,
        packageName: packageInfo.packageName,
        packageVersion: packageInfo.packageVersion,
        version: implementation.version ?? packageInfo.packageVersion,
        rootPath: packageInfo.rootPath,
        requiredDependencies: new Set(implementation.requiredPlugins),
        usedDependencies: new Set(implementation.usedPlugins),
      });
    }

    return descriptors;
  }

  private async instantiate(descriptor: PluginDescriptor<PluginClass>): Promise<Plugin> {
    this.logger.debug('Initializing plugin', { plugin: descriptor.name, version: descriptor.version });
    const plugin = new descriptor.implementation(this, descriptor);
    await this.hostScope.run(() => this.contextStack.run(plugin, () => plugin.init()));
    return plugin;
  }

  private fail(name: string, error: PluginError): void {
    this.logger.error(error.message, { plugin: name, code: error.code });
    this.state.recordFailure(name, error);
  }
}
