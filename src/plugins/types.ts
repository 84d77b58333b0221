import type { Config } from '../config/config.js';
import type { ArtifactWriter } from '../artifacts/writer.js';
import type { Logger } from '../utils/logger.js';

/** One check's outcome: its name and how long it ran. */
export interface CheckOutcome {
  name: string;
  elapsedMs: number;
}

/**
 * Outcomes partitioned by disposition. A check appears in exactly one of the
 * three lists, and each list keeps the order the plugin ran its checks in.
 */
export interface ResultSet {
  passed: CheckOutcome[];
  failed: CheckOutcome[];
  errored: CheckOutcome[];
}

/** Collaborators handed to every plugin call of one invocation. */
export interface ExecutionContext {
  /** Tagged `emitter=plugin` so plugin lines stand apart in the log. */
  logger: Logger;
  artifacts: ArtifactWriter;
  /** Aborted on SIGINT/SIGTERM. The harness never polls it; plugins may. */
  signal: AbortSignal;
}

/** An option a plugin adds to its own subcommand. */
export interface PluginFlag {
  name: string;
  description: string;
  type: 'string' | 'boolean';
  /** Single-letter alias, without the dash. */
  short?: string;
  defaultValue?: string | boolean;
}

/**
 * A certkit plugin.
 *
 * Plugin files should default-export an object conforming to this interface:
 *
 * ```js
 * export default {
 *   name: 'check-container',
 *   version: '1.0.0',
 *   async init(ctx, config, args) { ... },
 *   async executeChecks(ctx) { ... },
 *   results(ctx) { return { passed: [], failed: [], errored: [] }; },
 *   async submit(ctx) { ... },
 * }
 * ```
 */
export interface Plugin {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  readonly flags?: readonly PluginFlag[];
  init(ctx: ExecutionContext, config: Config, args: string[]): Promise<void>;
  executeChecks(ctx: ExecutionContext): Promise<void>;
  results(ctx: ExecutionContext): ResultSet | Promise<ResultSet>;
  submit(ctx: ExecutionContext): Promise<void>;
}
