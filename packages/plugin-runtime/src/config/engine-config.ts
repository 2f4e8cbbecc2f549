/**
 * @module @plugwork/plugin-runtime/config/engine-config
 * Engine configuration: JSON file, environment, validation.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@plugwork/plugin-contracts';

export const DEFAULT_CONFIG_FILE = 'plugwork.config.json';

export const namespaceSchema = z.string().trim().min(1, 'Plugin namespace must not be empty');

export const pluginNamesSchema = z
  .array(z.string().trim().min(1, 'Plugin names must not be empty'))
  .superRefine((names, ctx) => {
    const seen = new Set<string>();
    names.forEach((name, index) => {
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Plugin ${name} is listed more than once`,
          path: [index],
        });
      }
      seen.add(name);
    });
  });

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const engineConfigSchema = z.object({
  namespace: namespaceSchema,
  plugins: pluginNamesSchema.default([]),
  skipFailed: z.boolean().default(true),
  logLevel: logLevelSchema.default('info'),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Parse `value` with `schema`, raising a ConfigError that lists every issue.
 */
export function parseConfig<TSchema extends z.ZodTypeAny>(schema: TSchema, value: unknown, what: string): z.output<TSchema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid ${what}: ${issues.join(', ')}`, { issues });
  }
  return result.data;
}

const booleanEnvSchema = z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform((value) => ['true', '1', 'yes'].includes(value));

/**
 * Configuration values found in the environment.
 *
 * - `PLUGWORK_NAMESPACE`
 * - `PLUGWORK_PLUGINS` (comma-separated)
 * - `PLUGWORK_SKIP_FAILED` (true/false/1/0/yes/no)
 * - `PLUGWORK_LOG_LEVEL`
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): Partial<EngineConfigInput> {
  const config: Partial<EngineConfigInput> = {};

  if (env.PLUGWORK_NAMESPACE !== undefined) {
    config.namespace = env.PLUGWORK_NAMESPACE;
  }
  if (env.PLUGWORK_PLUGINS !== undefined) {
    config.plugins = env.PLUGWORK_PLUGINS.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
  }
  if (env.PLUGWORK_SKIP_FAILED !== undefined) {
    config.skipFailed = parseConfig(booleanEnvSchema, env.PLUGWORK_SKIP_FAILED.trim().toLowerCase(), 'PLUGWORK_SKIP_FAILED');
  }
  if (env.PLUGWORK_LOG_LEVEL !== undefined) {
    config.logLevel = parseConfig(logLevelSchema, env.PLUGWORK_LOG_LEVEL.trim(), 'PLUGWORK_LOG_LEVEL');
  }

  return config;
}

async function readConfigFile(configPath: string, required: boolean): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Could not read config file ${configPath}`, {
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
      path: configPath,
    });
  }
}

export interface LoadEngineConfigOptions {
  /** Directory the default config file is looked up in */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Applied last, over file and environment */
  overrides?: Partial<EngineConfigInput>;
}

/**
 * Load the engine configuration.
 *
 * Layers, later ones winning: the JSON config file, the environment,
 * `overrides`.
 */
export async function loadEngineConfig(options: LoadEngineConfigOptions = {}): Promise<EngineConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : path.join(cwd, DEFAULT_CONFIG_FILE);

  const fileConfig = parseConfig(engineConfigSchema.partial(), await readConfigFile(configPath, options.configPath !== undefined), `config file ${configPath}`);

  return parseConfig(
    engineConfigSchema,
    {
      ...fileConfig,
      ...readEnvConfig(options.env ?? process.env),
      ...options.overrides,
    },
    'plugin engine configuration'
  );
}
