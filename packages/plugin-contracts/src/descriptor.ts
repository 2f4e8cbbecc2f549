/**
 * Plugin descriptor
 *
 * A discovered, validated plugin before it is instantiated. The engine builds
 * one per candidate from the loader's output and the implementation's own
 * static declarations.
 */

/**
 * Hard and soft dependencies of a single candidate.
 */
export interface DependencySpec {
  /** Plugins that must be loaded first; unmet means this plugin cannot load */
  required: ReadonlySet<string>;
  /** Plugins preferred to load first; never blocks loading */
  used: ReadonlySet<string>;
}

/**
 * Identity shared by descriptors and live plugin instances.
 */
export interface PluginIdentity {
  /** Configured plugin name, unique within one load */
  name: string;
  packageName: string;
  packageVersion: string;
  /** Explicit version of the plugin, or the package version */
  version: string;
  /** Directory of the module that defines the plugin */
  rootPath: string;
}

export interface PluginDescriptor<TImplementation = unknown> extends PluginIdentity {
  requiredDependencies: ReadonlySet<string>;
  usedDependencies: ReadonlySet<string>;
  implementation: TImplementation;
}

/**
 * Candidate name to dependency spec, as consumed by the resolver.
 */
export type DependencyMap = ReadonlyMap<string, DependencySpec>;

export function toDependencySpec(descriptor: Pick<PluginDescriptor, 'requiredDependencies' | 'usedDependencies'>): DependencySpec {
  return {
    required: descriptor.requiredDependencies,
    used: descriptor.usedDependencies,
  };
}
