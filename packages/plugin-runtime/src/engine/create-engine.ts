/**
 * @module @plugwork/plugin-runtime/engine/create-engine
 * Engine construction from a validated configuration.
 */

import type { EngineConfig } from '../config/engine-config.js';
import { createEngineLogger } from '../logging.js';
import { PluginEngine, type PluginEngineOptions } from './plugin-engine.js';

export type PluginEngineDeps = Omit<PluginEngineOptions, 'namespace' | 'plugins'>;

/**
 * Build an engine configured from `config`. A pino logger at the configured
 * level is created unless `deps.logger` is given.
 *
 * @example
 * ```typescript
 * const config = await loadEngineConfig();
 * const engine = createPluginEngine(config, { loader: new NodePackageLoader() });
 * await engine.loadPlugins({ skipFailed: config.skipFailed });
 * ```
 */
export function createPluginEngine(config: EngineConfig, deps: PluginEngineDeps): PluginEngine {
  return new PluginEngine({
    ...deps,
    logger: deps.logger ?? createEngineLogger(config.namespace, { level: config.logLevel }),
    namespace: config.namespace,
    plugins: config.plugins,
  });
}
