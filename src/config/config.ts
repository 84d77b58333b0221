export type ConfigValue = string | boolean | number;

/** Reads a flag's value, or undefined when the user did not set the flag. */
export type FlagLookup = () => ConfigValue | undefined;

export type EnvSource = Record<string, string | undefined>;

export interface EnvBinding {
  /** Prepended to every key, joined with `_`. Matched case-insensitively by upper-casing. */
  prefix?: string;
  /** Rewrites a key before it becomes a variable name, e.g. `-` to `_`. */
  keyReplacer?: (key: string) => string;
}

export interface ConfigOptions {
  env?: EnvSource;
  envBinding?: EnvBinding;
}

const TRUE_STRINGS = new Set(['1', 't', 'true', 'y', 'yes', 'on']);

/** Replace every hyphen with an underscore. */
export const hyphensToUnderscores = (key: string): string => key.replaceAll('-', '_');

function normalizeKey(key: string): string {
  return key.toLowerCase();
}

/**
 * Layered key/value configuration. Lookups resolve, highest first:
 *
 *   1. values assigned with `set`
 *   2. bound flags the user actually passed
 *   3. environment variables, only once an env binding is in place
 *   4. defaults
 *
 * An instance is never shared between invocations. `derive` and
 * `withEnvBinding` copy every layer into a new instance, so whatever the copy
 * is later given never reaches the instance it came from.
 */
export class Config {
  private readonly overrides = new Map<string, ConfigValue>();
  private readonly flags = new Map<string, FlagLookup>();
  private readonly defaults = new Map<string, ConfigValue>();
  private readonly env: EnvSource;
  private readonly binding: EnvBinding | undefined;

  constructor(options: ConfigOptions = {}) {
    this.env = options.env ?? process.env;
    this.binding = options.envBinding;
  }

  get envBinding(): EnvBinding | undefined {
    return this.binding;
  }

  setDefault(key: string, value: ConfigValue): void {
    this.defaults.set(normalizeKey(key), value);
  }

  set(key: string, value: ConfigValue): void {
    this.overrides.set(normalizeKey(key), value);
  }

  bindFlag(key: string, lookup: FlagLookup): void {
    this.flags.set(normalizeKey(key), lookup);
  }

  /** The environment variable consulted for `key`, or undefined when env lookups are off. */
  envVarName(key: string): string | undefined {
    if (!this.binding) return undefined;
    let name = normalizeKey(key);
    if (this.binding.keyReplacer) name = this.binding.keyReplacer(name);
    if (this.binding.prefix) name = `${this.binding.prefix}_${name}`;
    return name.toUpperCase();
  }

  get(key: string): ConfigValue | undefined {
    const k = normalizeKey(key);
    if (this.overrides.has(k)) return this.overrides.get(k);

    const flagValue = this.flags.get(k)?.();
    if (flagValue !== undefined) return flagValue;

    const envName = this.envVarName(k);
    if (envName !== undefined) {
      const envValue = this.env[envName];
      if (envValue !== undefined) return envValue;
    }

    return this.defaults.get(k);
  }

  isSet(key: string): boolean {
    return this.get(key) !== undefined;
  }

  getString(key: string): string {
    const value = this.get(key);
    return value === undefined ? '' : String(value);
  }

  getBool(key: string): boolean {
    const value = this.get(key);
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (typeof value === 'string') return TRUE_STRINGS.has(value.trim().toLowerCase());
    return false;
  }

  /** A copy of every layer. Later changes to either instance stay on that instance. */
  derive(): Config {
    return this.copyInto(new Config({ env: this.env, envBinding: this.binding }));
  }

  /** A copy that also consults environment variables according to `binding`. */
  withEnvBinding(binding: EnvBinding): Config {
    return this.copyInto(new Config({ env: this.env, envBinding: { ...binding } }));
  }

  private copyInto(target: Config): Config {
    for (const [k, v] of this.overrides) target.overrides.set(k, v);
    for (const [k, v] of this.flags) target.flags.set(k, v);
    for (const [k, v] of this.defaults) target.defaults.set(k, v);
    return target;
  }
}
