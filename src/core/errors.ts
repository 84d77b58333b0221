export class HarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HarnessError';
  }
}

export class PluginNotFoundError extends HarnessError {
  constructor(public readonly pluginName: string) {
    super(`No plugin registered under "${pluginName}"`);
    this.name = 'PluginNotFoundError';
  }
}

export class DuplicatePluginError extends HarnessError {
  constructor(public readonly pluginName: string) {
    super(`A plugin is already registered under "${pluginName}"`);
    this.name = 'DuplicatePluginError';
  }
}

export class RegistryFrozenError extends HarnessError {
  constructor(pluginName: string) {
    super(`Cannot register "${pluginName}": the plugin registry is frozen`);
    this.name = 'RegistryFrozenError';
  }
}

export class UnknownFormatError extends HarnessError {
  constructor(
    public readonly format: string,
    known: readonly string[],
  ) {
    super(`Unknown result format "${format}". Must be one of: ${known.join(', ')}`);
    this.name = 'UnknownFormatError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
