/**
 * Testing utilities for plugins and engines
 * @module @plugwork/plugin-testing
 */

import type { HostScope, PackageInfo, PluginHandle, PluginLoader, PluginLogger } from '@plugwork/plugin-contracts';
import { PluginContextStack, PluginEngine, type Plugin, type PluginEngineOptions } from '@plugwork/plugin-runtime';

/**
 * One registration of a plugin name.
 */
export interface InMemoryPluginEntry {
  /** Value returned by materialize */
  module?: unknown;
  /** Called by materialize instead of returning `module`; may throw */
  load?: () => unknown;
  packageName?: string;
  packageVersion?: string;
  rootPath?: string;
  source?: string;
}

export interface InMemoryPluginHandle extends PluginHandle {
  namespace: string;
  entry: InMemoryPluginEntry;
}

export const DEFAULT_PACKAGE_VERSION = '1.2.3';

/**
 * Loader over registrations made in code.
 *
 * @example
 * const loader = new InMemoryPluginLoader()
 *   .register('coffee', 'espresso', { module: EspressoPlugin })
 *   .register('coffee', 'importfail', { load: () => { throw new Error('boom'); } });
 */
export class InMemoryPluginLoader implements PluginLoader<InMemoryPluginHandle> {
  private readonly registrations = new Map<string, Map<string, InMemoryPluginEntry[]>>();
  readonly materialized: string[] = [];

  register(namespace: string, name: string, entry: InMemoryPluginEntry): this {
    let byName = this.registrations.get(namespace);
    if (!byName) {
      byName = new Map();
      this.registrations.set(namespace, byName);
    }
    byName.set(name, [...(byName.get(name) ?? []), entry]);
    return this;
  }

  async find(namespace: string, name: string): Promise<readonly InMemoryPluginHandle[]> {
    const entries = this.registrations.get(namespace)?.get(name) ?? [];
    return entries.map((entry, index) => ({
      name,
      namespace,
      entry,
      source: entry.source ?? `${namespace}/${name}#${index}`,
    }));
  }

  async materialize(handle: InMemoryPluginHandle): Promise<unknown> {
    this.materialized.push(handle.name);
    if (handle.entry.load) {
      return handle.entry.load();
    }
    return handle.entry.module;
  }

  async packageInfo(handle: InMemoryPluginHandle): Promise<PackageInfo> {
    return {
      packageName: handle.entry.packageName ?? `${handle.name}-plugin`,
      packageVersion: handle.entry.packageVersion ?? DEFAULT_PACKAGE_VERSION,
      rootPath: handle.entry.rootPath ?? `/plugins/${handle.name}`,
    };
  }
}

export interface CapturedLogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown> | Error;
  bindings: Record<string, unknown>;
}

export interface CapturingLogger extends PluginLogger {
  readonly entries: CapturedLogEntry[];
}

/**
 * Logger recording every call; children share the parent's entries.
 */
export function createCapturingLogger(
  entries: CapturedLogEntry[] = [],
  bindings: Record<string, unknown> = {}
): CapturingLogger {
  const record = (level: CapturedLogEntry['level']) => (message: string, meta?: Record<string, unknown> | Error) => {
    entries.push({ level, message, meta, bindings });
  };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (childBindings) => createCapturingLogger(entries, { ...bindings, ...childBindings }),
  };
}

/**
 * Host scope tracking how often it was entered and whether it is open.
 */
export class RecordingHostScope implements HostScope {
  entered = 0;
  exited = 0;

  get active(): boolean {
    return this.entered > this.exited;
  }

  async run<R>(fn: () => R | Promise<R>): Promise<R> {
    this.entered += 1;
    try {
      return await fn();
    } finally {
      this.exited += 1;
    }
  }
}

export interface TestEngine {
  engine: PluginEngine;
  loader: InMemoryPluginLoader;
  logger: CapturingLogger;
  hostScope: RecordingHostScope;
  contextStack: PluginContextStack<Plugin>;
}

/**
 * Engine wired to in-memory collaborators and a private context stack.
 */
export function createTestEngine(
  namespace: string,
  plugins: readonly string[],
  overrides: Pick<PluginEngineOptions, 'pluginClass' | 'signals'> = {}
): TestEngine {
  const loader = new InMemoryPluginLoader();
  const logger = createCapturingLogger();
  const hostScope = new RecordingHostScope();
  const contextStack = new PluginContextStack<Plugin>();

  const engine = new PluginEngine({
    loader,
    logger,
    hostScope,
    contextStack,
    namespace,
    plugins,
    ...overrides,
  });

  return { engine, loader, logger, hostScope, contextStack };
}
