/**
 * Host collaborators
 *
 * What the engine needs from the application that embeds it.
 */

/**
 * Application-scoped resource acquired around each plugin's init hook.
 * The engine does not know what the scope represents.
 */
export interface HostScope {
  run<R>(fn: () => R | Promise<R>): Promise<R>;
}

/**
 * Listener for the "plugins loaded" announcement.
 */
export type PluginsLoadedListener = () => void;

/**
 * Broadcast channel used by the engine once a load pass completes.
 */
export interface PluginSignals {
  /** Fire-and-forget; listeners are not awaited */
  announcePluginsLoaded(): void;
  /** Returns a function that removes the listener */
  onPluginsLoaded(listener: PluginsLoadedListener): () => void;
}
