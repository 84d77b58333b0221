import { Command } from 'commander';
import type { Config } from '../config/config.js';
import { applyDefaults } from '../config/defaults.js';
import type { PluginRegistry } from '../plugins/registry.js';
import { addHarnessOptions } from './flags.js';
import { createPluginCommand, invokePlugin, type CommandDeps } from './plugin-command.js';

/** `run <plugin>`: one subcommand per registered plugin, in name order. */
export function createRunCommand(config: Config, registry: PluginRegistry, deps: CommandDeps = {}): Command {
  const cmd = new Command('run').description('Run the checks of a registered plugin');

  addHarnessOptions(cmd, config);
  applyDefaults(config);

  for (const [invocation, plugin] of registry.entries()) {
    cmd.addCommand(
      createPluginCommand({
        name: invocation,
        config,
        plugin,
        action: (args, scoped) => invokePlugin(invocation, args, scoped, registry, deps),
      }),
    );
  }

  return cmd;
}
