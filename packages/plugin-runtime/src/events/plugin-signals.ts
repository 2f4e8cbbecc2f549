/**
 * @module @plugwork/plugin-runtime/events/plugin-signals
 * Default broadcast channel for engine announcements.
 */

import { EventEmitter } from 'node:events';
import type { PluginSignals, PluginsLoadedListener } from '@plugwork/plugin-contracts';

export const PLUGINS_LOADED = 'plugins.loaded';

export class EventEmitterPluginSignals implements PluginSignals {
  readonly emitter: EventEmitter;

  constructor(emitter: EventEmitter = new EventEmitter()) {
    this.emitter = emitter;
  }

  announcePluginsLoaded(): void {
    this.emitter.emit(PLUGINS_LOADED);
  }

  onPluginsLoaded(listener: PluginsLoadedListener): () => void {
    this.emitter.on(PLUGINS_LOADED, listener);
    return () => {
      this.emitter.off(PLUGINS_LOADED, listener);
    };
  }
}
