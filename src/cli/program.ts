import { Command } from 'commander';
import { Config } from '../config/config.js';
import type { PluginRegistry } from '../plugins/registry.js';
import { createCompatCommand } from './compat-command.js';
import type { CommandDeps } from './plugin-command.js';
import { createRunCommand } from './run-command.js';

export interface ProgramOptions extends CommandDeps {
  version: string;
}

/** The top-level command. `registry` must be fully populated: subcommands are built from it once. */
export function buildProgram(registry: PluginRegistry, options: ProgramOptions): Command {
  const program = new Command();

  program
    .name('certkit')
    .description('Run certification check plugins and collect their results')
    .version(options.version);

  program.addCommand(createRunCommand(new Config({ env: options.env }), registry, options));
  program.addCommand(createCompatCommand(registry, options));

  return program;
}
