/**
 * Plugin execution context
 */

import type { Plugin } from '../plugin.js';
import { PluginContextStack } from './context-stack.js';

export { PluginContextStack } from './context-stack.js';
export { PluginWrapCache } from './wrap-cache.js';

/**
 * Process-wide stack used by engines that are not given one explicitly.
 */
export const pluginContextStack = new PluginContextStack<Plugin>();

/**
 * The plugin the calling code is running on behalf of, if any.
 */
export function currentPlugin(stack: PluginContextStack<Plugin> = pluginContextStack): Plugin | undefined {
  return stack.peek();
}
