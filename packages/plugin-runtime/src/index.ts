/**
 * @plugwork/plugin-runtime
 *
 * Plugin engine: dependency resolution, instantiation and the plugin
 * execution context.
 */

// Engine
export {
  PluginEngine,
  PluginEngineState,
  createPluginEngine,
  type PluginEngineOptions,
  type LoadPluginsOptions,
  type EngineStatus,
  type PluginEngineDeps,
} from './engine/index.js';

// Plugins
export { Plugin, isPluginClass, type PluginClass } from './plugin.js';

// Resolver
export { resolveDependencies, resolveDependencyLayers } from './resolver/resolve-dependencies.js';

// Context
export { PluginContextStack, PluginWrapCache, pluginContextStack, currentPlugin } from './context/index.js';

// Events
export { EventEmitterPluginSignals, PLUGINS_LOADED } from './events/plugin-signals.js';

// Loaders
export {
  NodePackageLoader,
  packageManifestSchema,
  parseEntryPoint,
  MANIFEST_FIELD,
  type NodePackageHandle,
  type NodePackageLoaderOptions,
  type PackageManifest,
} from './loader/node-package-loader.js';

// Config
export {
  engineConfigSchema,
  loadEngineConfig,
  readEnvConfig,
  parseConfig,
  DEFAULT_CONFIG_FILE,
  type EngineConfig,
  type EngineConfigInput,
  type LoadEngineConfigOptions,
} from './config/engine-config.js';

// Logging
export { createEngineLogger, fromPinoLogger, type EngineLoggerOptions } from './logging.js';

// Utils
export { trimDocstring, splitDocstring, NO_DESCRIPTION } from './utils/docstring.js';
