import { hyphensToUnderscores, type Config, type EnvBinding } from './config.js';

export const DEFAULT_LOG_FILE = 'certkit.log';
export const DEFAULT_LOG_LEVEL = 'info';
export const DEFAULT_ARTIFACTS_DIR = 'artifacts';
export const DEFAULT_FORMAT = 'text';

/** Environment names every invocation answers to, e.g. `PFLT_LOGFILE` or `PFLT_SUBMIT`. */
export const INVOCATION_ENV_BINDING: EnvBinding = {
  prefix: 'pflt',
  keyReplacer: hyphensToUnderscores,
};

export const CONFIG_KEYS = {
  logFile: 'logfile',
  logLevel: 'loglevel',
  artifacts: 'artifacts',
  format: 'format',
  submit: 'submit',
} as const;

export function applyDefaults(config: Config, options: { submit?: boolean } = {}): void {
  config.setDefault(CONFIG_KEYS.logFile, DEFAULT_LOG_FILE);
  config.setDefault(CONFIG_KEYS.logLevel, DEFAULT_LOG_LEVEL);
  config.setDefault(CONFIG_KEYS.artifacts, DEFAULT_ARTIFACTS_DIR);
  config.setDefault(CONFIG_KEYS.format, DEFAULT_FORMAT);
  if (options.submit !== undefined) {
    config.setDefault(CONFIG_KEYS.submit, options.submit);
  }
}
