import { readdirSync, existsSync, statSync } from 'node:fs';
import { resolve, join, extname } from 'node:path';
import { homedir } from 'node:os';
import { pathToFileURL } from 'node:url';
import { createRequire } from 'node:module';
import type { Plugin } from './types.js';
import type { PluginRegistry } from './registry.js';
import { errorMessage } from '../core/errors.js';
import { log } from '../utils/logger.js';

const DEFAULT_PLUGIN_DIR = join(homedir(), '.certkit', 'plugins');
const PLUGIN_FILE_EXTENSIONS = new Set(['.js', '.mjs', '.ts', '.mts']);
const NPM_PLUGIN_PREFIX = 'certkit-plugin-';
const LIFECYCLE_METHODS = ['init', 'executeChecks', 'results', 'submit'] as const;

/**
 * Validates that an object conforms to the Plugin interface:
 * string `name` and `version`, and a function for every lifecycle stage.
 */
function isValidPlugin(obj: unknown): obj is Plugin {
  if (obj == null || typeof obj !== 'object') return false;
  if (!('name' in obj) || typeof obj.name !== 'string' || obj.name === '') return false;
  if (!('version' in obj) || typeof obj.version !== 'string') return false;
  return LIFECYCLE_METHODS.every((method) => typeof Reflect.get(obj, method) === 'function');
}

function defaultExport(mod: unknown): unknown {
  if (mod != null && typeof mod === 'object' && 'default' in mod && mod.default != null) {
    return mod.default;
  }
  return mod;
}

/**
 * Load a single plugin from a module specifier.
 * Returns the plugin if valid, null otherwise.
 */
async function importPlugin(fileUrl: string, label: string): Promise<Plugin | null> {
  try {
    const mod: unknown = await import(fileUrl);
    const plugin = defaultExport(mod);

    if (!isValidPlugin(plugin)) {
      log.warn(`Plugin "${label}" does not export a valid plugin (needs name, version, init, executeChecks, results, submit). Skipping.`);
      return null;
    }

    return plugin;
  } catch (err) {
    log.warn(`Failed to load plugin "${label}": ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Scan a directory for plugin files (.js, .mjs, .ts, .mts).
 * Returns an array of absolute file paths, sorted.
 */
function scanDirectory(dir: string): string[] {
  if (!existsSync(dir)) return [];

  try {
    const stat = statSync(dir);
    if (!stat.isDirectory()) return [];
  } catch {
    return [];
  }

  const files: string[] = [];
  try {
    const entries = readdirSync(dir).sort();
    for (const entry of entries) {
      const ext = extname(entry);
      if (PLUGIN_FILE_EXTENSIONS.has(ext)) {
        files.push(resolve(dir, entry));
      }
    }
  } catch (err) {
    log.warn(`Failed to scan plugin directory "${dir}": ${errorMessage(err)}`);
  }

  return files;
}

/**
 * Discover npm packages matching the `certkit-plugin-*` pattern.
 * Looks in node_modules of the current working directory.
 * Returns an array of package names that can be imported.
 */
function discoverNpmPlugins(cwd?: string): string[] {
  const nodeModulesDir = resolve(cwd ?? process.cwd(), 'node_modules');
  if (!existsSync(nodeModulesDir)) return [];

  const packages: string[] = [];
  try {
    const entries = readdirSync(nodeModulesDir).sort();
    for (const entry of entries) {
      if (entry.startsWith(NPM_PLUGIN_PREFIX)) {
        const pkgDir = join(nodeModulesDir, entry);
        try {
          if (statSync(pkgDir).isDirectory()) {
            packages.push(entry);
          }
        } catch (err) {
          log.debug(`Skipping ${entry}: ${errorMessage(err)}`);
        }
      }
    }
  } catch (err) {
    log.debug(`Could not scan node_modules for plugins: ${errorMessage(err)}`);
  }

  return packages;
}

export interface LoadPluginsOptions {
  /** Default: ~/.certkit/plugins */
  pluginDir?: string;
  /** Directory whose node_modules is searched. Default: process.cwd() */
  cwd?: string;
}

/**
 * Registers every plugin found in:
 *   1. A plugin directory (default: ~/.certkit/plugins/)
 *   2. npm packages matching `certkit-plugin-*` in node_modules
 *
 * Plugins already in the registry win over loaded ones with the same name.
 * Invalid plugins are skipped with a warning. Returns the names registered.
 */
export async function loadPlugins(registry: PluginRegistry, options: LoadPluginsOptions = {}): Promise<string[]> {
  const dir = options.pluginDir ?? DEFAULT_PLUGIN_DIR;
  const loaded: string[] = [];

  const add = (plugin: Plugin, source: string): void => {
    if (registry.has(plugin.name)) {
      log.warn(`Duplicate plugin name "${plugin.name}" from ${source}. Skipping.`);
      return;
    }
    registry.register(plugin);
    loaded.push(plugin.name);
    log.info(`Loaded plugin: ${plugin.name} v${plugin.version}`);
  };

  // 1. Load from plugin directory
  const files = scanDirectory(dir);
  if (files.length > 0) {
    log.info(`Found ${files.length} plugin file(s) in ${dir}`);
  }

  for (const file of files) {
    const plugin = await importPlugin(pathToFileURL(file).href, file);
    if (plugin) add(plugin, file);
  }

  // 2. Load npm plugin packages
  const npmPackages = discoverNpmPlugins(options.cwd);
  if (npmPackages.length > 0) {
    log.info(`Found ${npmPackages.length} npm plugin package(s): ${npmPackages.join(', ')}`);
  }

  const requireFromCwd = createRequire(join(resolve(options.cwd ?? process.cwd()), 'package.json'));
  for (const pkg of npmPackages) {
    let entry: string;
    try {
      entry = requireFromCwd.resolve(pkg);
    } catch (err) {
      log.warn(`Failed to resolve npm plugin "${pkg}": ${errorMessage(err)}`);
      continue;
    }
    const plugin = await importPlugin(pathToFileURL(entry).href, pkg);
    if (plugin) add(plugin, `npm package ${pkg}`);
  }

  if (loaded.length > 0) {
    log.info(`Total plugins loaded: ${loaded.length}`);
  }

  return loaded;
}

// Re-export for testing
export { isValidPlugin, scanDirectory, discoverNpmPlugins, DEFAULT_PLUGIN_DIR };
