#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
loadEnv({ path: '.env.local', override: false });
loadEnv({ override: false }); // fallback to .env

import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { buildProgram } from './cli/program.js';
import { listenForStop } from './cli/signal-handlers.js';
import { errorMessage } from './core/errors.js';
import { loadPlugins } from './plugins/loader.js';
import { PluginRegistry } from './plugins/registry.js';
import { log } from './utils/logger.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (pkg != null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export async function main(argv: string[]): Promise<void> {
  const registry = new PluginRegistry();
  await loadPlugins(registry, { pluginDir: process.env.CERTKIT_PLUGIN_DIR });
  registry.freeze();

  const stop = listenForStop(log);

  try {
    await buildProgram(registry, { version: readVersion(), signal: stop.signal }).parseAsync(argv);
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
  } finally {
    stop.dispose();
  }
}

main(process.argv).catch((err: unknown) => {
  console.error(chalk.red(`Fatal: ${errorMessage(err)}`));
  process.exitCode = 1;
});
