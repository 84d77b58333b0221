import type { Config } from '../config/config.js';
import { CONFIG_KEYS, DEFAULT_FORMAT, INVOCATION_ENV_BINDING } from '../config/defaults.js';
import type { PluginRegistry } from '../plugins/registry.js';
import type { ExecutionContext, Plugin, ResultSet } from '../plugins/types.js';
import { getFormatter, resultsFileName, type ResultFormatter } from '../reporter/index.js';
import { MultiWriter, sinkTarget, streamTarget } from '../results/multi-writer.js';
import type { ResultSink, ResultWriter } from '../results/result-writer.js';
import type { Logger, OutputStream } from '../utils/logger.js';
import { createCollaborators, type Collaborators } from './collaborators.js';

export type LifecycleState =
  | 'uninitialized'
  | 'initialized'
  | 'checksExecuted'
  | 'resultsCollected'
  | 'submitted'
  | 'done'
  | 'failed';

export type LifecycleStage = 'setup' | 'init' | 'executeChecks' | 'results' | 'format' | 'submit';

export type TransitionListener = (from: LifecycleState, to: LifecycleState) => void;

export interface RunRequest {
  /** Registry key of the plugin to drive. */
  pluginName: string;
  /** Arguments left over after flag parsing, handed to the plugin's init. */
  args: string[];
  /** Never mutated: the run works on its own copy. */
  config: Config;
  registry: PluginRegistry;
  resultWriter: ResultWriter;
  /** Console stream the report is echoed to. Default: process.stdout */
  stdout?: OutputStream;
  /** Console stream log lines are echoed to. Default: process.stderr */
  stderr?: OutputStream;
  signal?: AbortSignal;
  now?: () => Date;
  onTransition?: TransitionListener;
}

export interface RunSummary {
  plugin: { name: string; version: string };
  state: LifecycleState;
  results: ResultSet;
  report: string;
  resultsPath: string;
  submitted: boolean;
}

class LifecycleTracker {
  private current: LifecycleState = 'uninitialized';

  constructor(
    private readonly logger: Logger,
    private readonly listener?: TransitionListener,
  ) {}

  get state(): LifecycleState {
    return this.current;
  }

  to(next: LifecycleState): void {
    const from = this.current;
    this.current = next;
    this.logger.debug('Lifecycle transition', { from, to: next });
    this.listener?.(from, next);
  }
}

/**
 * Runs one invocation of a registered plugin: init, executeChecks, results,
 * then the report is written to the console and the results file, then
 * submit when the `submit` key is true.
 *
 * Every stage waits for the one before it and nothing runs after a failure.
 * The error that stopped the run is logged once and rethrown unchanged.
 * Failing to write the finished report is logged and does not fail the run.
 */
export async function run(request: RunRequest): Promise<RunSummary> {
  const plugin = request.registry.require(request.pluginName);
  const config = request.config.withEnvBinding(INVOCATION_ENV_BINDING);

  const collaborators = createCollaborators(
    {
      logFile: config.getString(CONFIG_KEYS.logFile),
      logLevel: config.getString(CONFIG_KEYS.logLevel),
      artifactsDir: config.getString(CONFIG_KEYS.artifacts),
    },
    { stderr: request.stderr, now: request.now },
  );

  try {
    return await drive(plugin, config, collaborators, request);
  } finally {
    collaborators.close();
  }
}

async function drive(
  plugin: Plugin,
  config: Config,
  { logger, artifacts }: Collaborators,
  request: RunRequest,
): Promise<RunSummary> {
  const identity = { name: plugin.name, version: plugin.version };
  const tracker = new LifecycleTracker(logger, request.onTransition);

  const ctx: ExecutionContext = {
    logger: logger.withValues({ emitter: 'plugin' }),
    artifacts,
    signal: request.signal ?? new AbortController().signal,
  };

  async function stage<T>(name: LifecycleStage, message: string, fn: () => T | Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logger.error(message, { ...identity, stage: name, error: err });
      tracker.to('failed');
      throw err;
    }
  }

  // The results destination must be writable before the plugin does anything.
  const formatter: ResultFormatter = await stage('setup', 'unable to select result format', () =>
    getFormatter(config.getString(CONFIG_KEYS.format) || DEFAULT_FORMAT),
  );
  const resultsPath = await stage('setup', 'unable to create results file', () =>
    artifacts.writeFile(resultsFileName(formatter), ''),
  );
  const sink: ResultSink = await stage('setup', 'unable to open results file', () =>
    request.resultWriter.openFile(resultsPath),
  );

  try {
    logger.info('Calling plugin', identity);

    await stage('init', 'unable to initialize plugin', () => plugin.init(ctx, config, request.args));
    tracker.to('initialized');

    await stage('executeChecks', 'unable to execute checks', () => plugin.executeChecks(ctx));
    tracker.to('checksExecuted');

    const results = await stage('results', 'unable to collect results', () => plugin.results(ctx));
    tracker.to('resultsCollected');

    const report = await stage('format', 'unable to format results', () =>
      formatter.format(results, { pluginName: plugin.name, pluginVersion: plugin.version }),
    );

    const output = new MultiWriter(streamTarget(request.stdout ?? process.stdout), sinkTarget(sink));
    try {
      await output.write(report);
    } catch (err) {
      logger.warn(`unable to write ${formatter.name} results`, { ...identity, path: resultsPath, error: err });
    }

    let submitted = false;
    if (config.getBool(CONFIG_KEYS.submit)) {
      logger.info('Submitting results', identity);
      await stage('submit', 'unable to call plugin submission', () => plugin.submit(ctx));
      tracker.to('submitted');
      submitted = true;
    }

    tracker.to('done');
    return { plugin: identity, state: tracker.state, results, report, resultsPath, submitted };
  } finally {
    await sink.close();
  }
}
