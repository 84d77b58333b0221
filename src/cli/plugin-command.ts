import { Command, Option } from 'commander';
import type { Config, EnvSource, FlagLookup } from '../config/config.js';
import { run } from '../core/run.js';
import type { PluginRegistry } from '../plugins/registry.js';
import type { Plugin, PluginFlag } from '../plugins/types.js';
import { FileResultWriter, type ResultWriter } from '../results/result-writer.js';
import type { OutputStream } from '../utils/logger.js';
import { optionLookup } from './flags.js';

/** What the command tree hands to every invocation it starts. */
export interface CommandDeps {
  env?: EnvSource;
  resultWriter?: ResultWriter;
  stdout?: OutputStream;
  stderr?: OutputStream;
  signal?: AbortSignal;
}

/** Runs once the plugin's flags are bound; `config` belongs to this invocation only. */
export type PluginAction = (args: string[], config: Config) => Promise<void>;

export interface PluginCommandOptions {
  /** Subcommand name. */
  name: string;
  /** Shared by every invocation of the command; copied, never written. */
  config: Config;
  /** Undefined when the plugin the command stands for is not registered. */
  plugin: Plugin | undefined;
  action: PluginAction;
}

function toOption(flag: PluginFlag): Option {
  const alias = flag.short ? `-${flag.short}, ` : '';
  const value = flag.type === 'string' ? ' <value>' : '';
  return new Option(`${alias}--${flag.name}${value}`, `${flag.description} (env: PFLT_${flag.name.replaceAll('-', '_').toUpperCase()})`);
}

/**
 * Builds the subcommand for one plugin. The plugin's own flags are bound into
 * a copy of `config` made when the command runs, so two plugins declaring the
 * same flag never overwrite each other's binding.
 */
export function createPluginCommand({ name, config, plugin, action }: PluginCommandOptions): Command {
  const summary = plugin ? `Run the ${plugin.name} plugin (v${plugin.version})` : `Run the ${name} checks`;
  const cmd = new Command(name)
    .description(plugin?.description ?? summary)
    .argument('[args...]', 'Arguments passed through to the plugin');

  const bindings: Array<{ flag: PluginFlag; lookup: FlagLookup }> = [];
  for (const flag of plugin?.flags ?? []) {
    const option = toOption(flag);
    cmd.addOption(option);
    bindings.push({ flag, lookup: optionLookup(cmd, option) });
  }

  cmd.action(async (args: string[]) => {
    const scoped = config.derive();
    for (const { flag, lookup } of bindings) {
      scoped.bindFlag(flag.name, lookup);
      if (flag.defaultValue !== undefined) scoped.setDefault(flag.name, flag.defaultValue);
    }
    await action(args, scoped);
  });

  return cmd;
}

/** Starts one run of `pluginName` with the command tree's dependencies. */
export async function invokePlugin(
  pluginName: string,
  args: string[],
  config: Config,
  registry: PluginRegistry,
  deps: CommandDeps,
): Promise<void> {
  await run({
    pluginName,
    args,
    config,
    registry,
    resultWriter: deps.resultWriter ?? new FileResultWriter(),
    stdout: deps.stdout,
    stderr: deps.stderr,
    signal: deps.signal,
  });
}
