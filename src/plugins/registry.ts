import { DuplicatePluginError, PluginNotFoundError, RegistryFrozenError } from '../core/errors.js';
import type { Plugin } from './types.js';

/**
 * Name → plugin mapping. Populated at startup, then frozen before the command
 * tree is built; lookups never see a registration made after that.
 */
export class PluginRegistry {
  private readonly plugins = new Map<string, Plugin>();
  private frozen = false;

  /** Registers `plugin` under `invocation` (its own name unless given). */
  register(plugin: Plugin, invocation: string = plugin.name): void {
    if (this.frozen) throw new RegistryFrozenError(invocation);
    if (this.plugins.has(invocation)) throw new DuplicatePluginError(invocation);
    this.plugins.set(invocation, plugin);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(invocation: string): boolean {
    return this.plugins.has(invocation);
  }

  get(invocation: string): Plugin | undefined {
    return this.plugins.get(invocation);
  }

  require(invocation: string): Plugin {
    const plugin = this.plugins.get(invocation);
    if (!plugin) throw new PluginNotFoundError(invocation);
    return plugin;
  }

  /** Invocation names, sorted. */
  names(): string[] {
    return [...this.plugins.keys()].sort();
  }

  entries(): Array<[string, Plugin]> {
    return this.names().map((name): [string, Plugin] => [name, this.require(name)]);
  }

  get size(): number {
    return this.plugins.size;
  }
}
