import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ConfigError } from '@plugwork/plugin-contracts';
import { createCapturingLogger, InMemoryPluginLoader } from '@plugwork/plugin-testing';
import { DEFAULT_CONFIG_FILE, loadEngineConfig, readEnvConfig } from '../config/engine-config.js';
import { createPluginEngine } from '../engine/create-engine.js';

describe('readEnvConfig', () => {
  it('should read nothing from an empty environment', () => {
    expect(readEnvConfig({})).toEqual({});
  });

  it('should split the plugin list', () => {
    expect(
      readEnvConfig({
        PLUGWORK_NAMESPACE: 'coffee',
        PLUGWORK_PLUGINS: ' espresso, milk,,sugar ',
        PLUGWORK_SKIP_FAILED: 'No',
        PLUGWORK_LOG_LEVEL: 'debug',
      })
    ).toEqual({
      namespace: 'coffee',
      plugins: ['espresso', 'milk', 'sugar'],
      skipFailed: false,
      logLevel: 'debug',
    });
  });

  it('should reject an invalid flag', () => {
    expect(() => readEnvConfig({ PLUGWORK_SKIP_FAILED: 'maybe' })).toThrow(ConfigError);
  });

  it('should reject an unknown log level', () => {
    expect(() => readEnvConfig({ PLUGWORK_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});

describe('loadEngineConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), 'plugwork-config-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('should apply defaults', async () => {
    await expect(loadEngineConfig({ cwd, env: { PLUGWORK_NAMESPACE: 'coffee' } })).resolves.toEqual({
      namespace: 'coffee',
      plugins: [],
      skipFailed: true,
      logLevel: 'info',
    });
  });

  it('should layer file, environment and overrides', async () => {
    await writeFile(
      path.join(cwd, DEFAULT_CONFIG_FILE),
      JSON.stringify({ namespace: 'coffee', plugins: ['espresso'], skipFailed: false, logLevel: 'warn' })
    );

    const config = await loadEngineConfig({
      cwd,
      env: { PLUGWORK_PLUGINS: 'espresso,milk', PLUGWORK_LOG_LEVEL: 'error' },
      overrides: { logLevel: 'debug' },
    });

    expect(config).toEqual({
      namespace: 'coffee',
      plugins: ['espresso', 'milk'],
      skipFailed: false,
      logLevel: 'debug',
    });
  });

  it('should read an explicit config file relative to cwd', async () => {
    await writeFile(path.join(cwd, 'tea.json'), JSON.stringify({ namespace: 'tea' }));

    const config = await loadEngineConfig({ cwd, env: {}, configPath: 'tea.json' });

    expect(config.namespace).toBe('tea');
  });

  it('should require an explicit config file to exist', async () => {
    await expect(loadEngineConfig({ cwd, env: {}, configPath: 'missing.json' })).rejects.toThrow(
      `Could not read config file ${path.join(cwd, 'missing.json')}`
    );
  });

  it('should require a namespace', async () => {
    await expect(loadEngineConfig({ cwd, env: {} })).rejects.toThrow(
      'Invalid plugin engine configuration: namespace: Required'
    );
  });

  it('should reject duplicate plugin names', async () => {
    await expect(
      loadEngineConfig({ cwd, env: { PLUGWORK_NAMESPACE: 'coffee', PLUGWORK_PLUGINS: 'milk,espresso,espresso' } })
    ).rejects.toThrow('Invalid plugin engine configuration: plugins.2: Plugin espresso is listed more than once');
  });

  it('should reject a config file that is not JSON', async () => {
    const configPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    await writeFile(configPath, '{ namespace: coffee');

    await expect(loadEngineConfig({ cwd, env: {} })).rejects.toThrow(`Invalid JSON in config file ${configPath}`);
  });

  it('should reject wrongly typed file values', async () => {
    const configPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    await writeFile(configPath, JSON.stringify({ namespace: 'coffee', skipFailed: 'yes' }));

    await expect(loadEngineConfig({ cwd, env: {} })).rejects.toThrow(
      `Invalid config file ${configPath}: skipFailed: Expected boolean, received string`
    );
  });
});

describe('createPluginEngine', () => {
  it('should configure the engine from the configuration', async () => {
    const loader = new InMemoryPluginLoader();
    const logger = createCapturingLogger();

    const engine = createPluginEngine(
      { namespace: 'coffee', plugins: ['espresso'], skipFailed: true, logLevel: 'info' },
      { loader, logger }
    );

    expect(engine.status).toBe('configured');
    expect(engine.toString()).toBe('<PluginEngine(coffee)>');
    await expect(engine.loadPlugins()).resolves.toBe(false);
    expect([...engine.getFailedPlugins()]).toEqual(['espresso']);
    expect(loader.materialized).toEqual([]);
  });
});
