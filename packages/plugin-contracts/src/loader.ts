/**
 * Discovery and loading collaborator
 *
 * The engine never imports plugin code itself: it asks a loader to find the
 * candidates registered under a name and to turn one of them into an
 * implementation.
 */

/**
 * Opaque reference to one registration of a plugin name.
 */
export interface PluginHandle {
  /** Plugin name the handle was registered under */
  name: string;
  /** Human readable origin, used in diagnostics (e.g. "espresso-plugin/lib/espresso.js") */
  source: string;
}

/**
 * Package metadata derived for a handle.
 */
export interface PackageInfo {
  packageName: string;
  packageVersion: string;
  rootPath: string;
}

export interface PluginLoader<THandle extends PluginHandle = PluginHandle> {
  /**
   * Every registration of `name` within `namespace`.
   * Zero or several results are reported by the engine as failures.
   */
  find(namespace: string, name: string): Promise<readonly THandle[]>;

  /**
   * Produce the implementation behind a handle. Rejects when it cannot.
   * The engine validates the returned value itself.
   */
  materialize(handle: THandle): Promise<unknown>;

  packageInfo(handle: THandle): Promise<PackageInfo>;
}
