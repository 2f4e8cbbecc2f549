/**
 * @plugwork/plugin-contracts
 *
 * Types and errors shared by the engine, its loaders and its hosts.
 */

// Errors
export {
  ErrorCode,
  PluginError,
  PluginNotFoundError,
  AmbiguousPluginError,
  PluginMaterializeError,
  PluginContractError,
  UnresolvableDependencyGraphError,
  PluginsAlreadyLoadedError,
  ContextMismatchError,
  ConfigError,
  isPluginError,
  wrapError,
  type ErrorCodeType,
  type SerializedError,
} from './errors.js';

// Descriptor
export {
  toDependencySpec,
  type DependencySpec,
  type DependencyMap,
  type PluginDescriptor,
  type PluginIdentity,
} from './descriptor.js';

// Collaborators
export type { PluginHandle, PackageInfo, PluginLoader } from './loader.js';
export type { HostScope, PluginSignals, PluginsLoadedListener } from './host.js';
export { createNoopLogger, type PluginLogger, type LogLevel } from './logger.js';
