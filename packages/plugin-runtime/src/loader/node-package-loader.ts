/**
 * @module @plugwork/plugin-runtime/loader/node-package-loader
 * Plugin discovery through installed packages.
 *
 * A package registers plugins in its package.json:
 *
 * ```json
 * {
 *   "name": "espresso-plugin",
 *   "version": "1.2.3",
 *   "plugwork": {
 *     "coffee": { "espresso": "./lib/espresso.js#EspressoPlugin" }
 *   }
 * }
 * ```
 *
 * The entry is a module path relative to the package root, optionally
 * followed by `#ExportName` (default export otherwise).
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { glob } from 'glob';
import { z } from 'zod';
import { createNoopLogger, type PackageInfo, type PluginHandle, type PluginLoader, type PluginLogger } from '@plugwork/plugin-contracts';

export const MANIFEST_FIELD = 'plugwork';

const entryPointSchema = z
  .string()
  .regex(/^[^#]+(#[A-Za-z_$][\w$]*)?$/, 'Entry point must be "<module path>" or "<module path>#<export>"');

export const packageManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  [MANIFEST_FIELD]: z.record(z.string(), z.record(z.string(), entryPointSchema)).optional(),
});

export type PackageManifest = z.infer<typeof packageManifestSchema>;

export interface NodePackageHandle extends PluginHandle {
  namespace: string;
  packageName: string;
  packageVersion: string;
  packageRoot: string;
  /** Absolute path of the module defining the plugin */
  modulePath: string;
  exportName: string;
}

export interface NodePackageLoaderOptions {
  /** node_modules directories to scan; defaults to `<cwd>/node_modules` */
  searchPaths?: readonly string[];
  logger?: PluginLogger;
}

export function parseEntryPoint(entry: string): { modulePath: string; exportName: string } {
  const hash = entry.lastIndexOf('#');
  if (hash === -1) {
    return { modulePath: entry, exportName: 'default' };
  }
  return { modulePath: entry.slice(0, hash), exportName: entry.slice(hash + 1) };
}

export class NodePackageLoader implements PluginLoader<NodePackageHandle> {
  private readonly searchPaths: readonly string[];
  private readonly logger: PluginLogger;
  private index?: Promise<NodePackageHandle[]>;

  constructor(options: NodePackageLoaderOptions = {}) {
    this.searchPaths = options.searchPaths ?? [path.join(process.cwd(), 'node_modules')];
    this.logger = options.logger ?? createNoopLogger();
  }

  async find(namespace: string, name: string): Promise<readonly NodePackageHandle[]> {
    const handles = await this.scan();
    return handles.filter((handle) => handle.namespace === namespace && handle.name === name);
  }

  async materialize(handle: NodePackageHandle): Promise<unknown> {
    const moduleExports: Record<string, unknown> = await import(pathToFileURL(handle.modulePath).href);
    if (!(handle.exportName in moduleExports)) {
      throw new Error(`Module ${handle.source} has no export named ${handle.exportName}`);
    }
    return moduleExports[handle.exportName];
  }

  async packageInfo(handle: NodePackageHandle): Promise<PackageInfo> {
    return {
      packageName: handle.packageName,
      packageVersion: handle.packageVersion,
      rootPath: path.dirname(handle.modulePath),
    };
  }

  /**
   * Forget the scanned packages; the next lookup scans again.
   */
  refresh(): void {
    this.index = undefined;
  }

  private scan(): Promise<NodePackageHandle[]> {
    this.index ??= this.buildIndex().catch((error: unknown) => {
      this.index = undefined;
      throw error;
    });
    return this.index;
  }

  private async buildIndex(): Promise<NodePackageHandle[]> {
    const handles: NodePackageHandle[] = [];

    for (const searchPath of this.searchPaths) {
      const manifests = await glob(['*/package.json', '@*/*/package.json'], { cwd: searchPath, absolute: true });
      for (const manifestPath of manifests.sort()) {
        const manifest = await this.readManifest(manifestPath);
        if (manifest) {
          handles.push(...toHandles(manifest, path.dirname(manifestPath)));
        }
      }
    }

    this.logger.debug('Scanned packages for plugins', { searchPaths: [...this.searchPaths], plugins: handles.length });
    return handles;
  }

  private async readManifest(manifestPath: string): Promise<PackageManifest | undefined> {
    let json: unknown;
    try {
      json = JSON.parse(await readFile(manifestPath, 'utf8'));
    } catch (error) {
      this.logger.warn('Skipping unreadable package manifest', {
        path: manifestPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const result = packageManifestSchema.safeParse(json);
    if (!result.success) {
      this.logger.warn('Skipping package with invalid plugin declarations', {
        path: manifestPath,
        issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return undefined;
    }
    return result.data;
  }
}

function toHandles(manifest: PackageManifest, packageRoot: string): NodePackageHandle[] {
  const handles: NodePackageHandle[] = [];
  for (const [namespace, entries] of Object.entries(manifest[MANIFEST_FIELD] ?? {})) {
    for (const [name, entry] of Object.entries(entries)) {
      const { modulePath, exportName } = parseEntryPoint(entry);
      handles.push({
        name,
        namespace,
        source: `${manifest.name}:${entry}`,
        packageName: manifest.name,
        packageVersion: manifest.version,
        packageRoot,
        modulePath: path.resolve(packageRoot, modulePath),
        exportName,
      });
    }
  }
  return handles;
}
