/**
 * @module @plugwork/plugin-testing
 * In-memory collaborators for testing plugins and engines
 */

export {
  InMemoryPluginLoader,
  RecordingHostScope,
  createCapturingLogger,
  createTestEngine,
  DEFAULT_PACKAGE_VERSION,
  type InMemoryPluginEntry,
  type InMemoryPluginHandle,
  type CapturedLogEntry,
  type CapturingLogger,
  type TestEngine,
} from './helpers.js';
