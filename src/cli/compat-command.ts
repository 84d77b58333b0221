import { Command, Option } from 'commander';
import { Config } from '../config/config.js';
import { applyDefaults, CONFIG_KEYS } from '../config/defaults.js';
import type { PluginRegistry } from '../plugins/registry.js';
import { addBoundOption, addHarnessOptions } from './flags.js';
import { createPluginCommand, invokePlugin, type CommandDeps } from './plugin-command.js';

/** Plugin `check container` stands for, whatever the configuration says. */
export const COMPAT_PLUGIN_NAME = 'check-container';

/**
 * `check container`, kept for callers of the old single-purpose tool. It is
 * `run check-container` with its own configuration instance and a `--submit`
 * flag; lookup and delegation are the only things that differ.
 *
 * Slated for removal once callers have moved to `run`.
 */
export function createCompatCommand(registry: PluginRegistry, deps: CommandDeps = {}): Command {
  const cmd = new Command('check')
    .description('Run checks for a container. Kept for backwards compatibility and will be removed in a future release.');

  const config = new Config({ env: deps.env });
  addHarnessOptions(cmd, config);
  addBoundOption(
    cmd,
    config,
    CONFIG_KEYS.submit,
    new Option('-s, --submit', 'Submit results if the called plugin supports automated submission. (env: PFLT_SUBMIT)'),
  );
  applyDefaults(config, { submit: false });

  cmd.addCommand(
    createPluginCommand({
      name: 'container',
      config,
      plugin: registry.get(COMPAT_PLUGIN_NAME),
      action: (args, scoped) => invokePlugin(COMPAT_PLUGIN_NAME, args, scoped, registry, deps),
    }),
  );

  return cmd;
}
