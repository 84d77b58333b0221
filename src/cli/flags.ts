import { Option, type Command } from 'commander';
import type { Config, ConfigValue, FlagLookup } from '../config/config.js';
import { CONFIG_KEYS } from '../config/defaults.js';
import { FORMAT_NAMES } from '../reporter/index.js';

function asConfigValue(value: unknown): ConfigValue | undefined {
  if (typeof value === 'string' || typeof value === 'boolean' || typeof value === 'number') {
    return value;
  }
  return undefined;
}

/**
 * Reads `option` off `command`, but only when the user passed it on the
 * command line. Otherwise the lookup yields undefined and the environment or
 * the default decides.
 */
export function optionLookup(command: Command, option: Option): FlagLookup {
  const key = option.attributeName();
  return () => {
    if (command.getOptionValueSource(key) !== 'cli') return undefined;
    return asConfigValue(command.getOptionValue(key));
  };
}

export function addBoundOption(command: Command, config: Config, key: string, option: Option): void {
  command.addOption(option);
  config.bindFlag(key, optionLookup(command, option));
}

/** Options every harness entry point takes. */
export function addHarnessOptions(command: Command, config: Config): void {
  addBoundOption(
    command,
    config,
    CONFIG_KEYS.logFile,
    new Option('--logfile <path>', 'Where the execution logfile will be written. (env: PFLT_LOGFILE)'),
  );
  addBoundOption(
    command,
    config,
    CONFIG_KEYS.logLevel,
    new Option('--loglevel <level>', 'The verbosity of the tool itself. Ex. warn, debug, trace, info, error. (env: PFLT_LOGLEVEL)'),
  );
  addBoundOption(
    command,
    config,
    CONFIG_KEYS.artifacts,
    new Option('--artifacts <dir>', 'Where check-specific artifacts will be written. (env: PFLT_ARTIFACTS)'),
  );
  addBoundOption(
    command,
    config,
    CONFIG_KEYS.format,
    new Option('--format <name>', `Results format: ${FORMAT_NAMES.join(', ')}. (env: PFLT_FORMAT)`),
  );
}
