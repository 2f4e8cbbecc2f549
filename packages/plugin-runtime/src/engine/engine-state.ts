/**
 * @module @plugwork/plugin-runtime/engine/engine-state
 * Mutable state owned by a single engine.
 */

import type { PluginError } from '@plugwork/plugin-contracts';
import type { Plugin } from '../plugin.js';

export type EngineStatus = 'unconfigured' | 'configured' | 'loading' | 'loaded' | 'loaded-with-failures' | 'aborted';

export class PluginEngineState {
  /** Set once, when loading starts */
  loaded = false;
  /** Set once the load pass has run to completion */
  settled = false;
  /** Set when the load pass threw before completing */
  aborted = false;
  readonly plugins = new Map<string, Plugin>();
  readonly failed = new Set<string>();
  readonly failures = new Map<string, PluginError>();

  recordFailure(name: string, error: PluginError): void {
    this.failed.add(name);
    this.failures.set(name, error);
  }

  status(configured: boolean): EngineStatus {
    if (!this.loaded) {
      return configured ? 'configured' : 'unconfigured';
    }
    if (this.aborted) {
      return 'aborted';
    }
    if (!this.settled) {
      return 'loading';
    }
    return this.failed.size === 0 ? 'loaded' : 'loaded-with-failures';
  }
}
