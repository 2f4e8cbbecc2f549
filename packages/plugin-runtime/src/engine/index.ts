export { PluginEngine, type PluginEngineOptions, type LoadPluginsOptions } from './plugin-engine.js';
export { PluginEngineState, type EngineStatus } from './engine-state.js';
export { createPluginEngine, type PluginEngineDeps } from './create-engine.js';
