import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Writable } from 'node:stream';
import { Config } from '../../src/config/config.js';
import { applyDefaults } from '../../src/config/defaults.js';
import { run, type LifecycleState, type RunRequest } from '../../src/core/run.js';
import { PluginNotFoundError, UnknownFormatError } from '../../src/core/errors.js';
import { PluginRegistry } from '../../src/plugins/registry.js';
import { FileResultWriter, type ResultWriter } from '../../src/results/result-writer.js';
import {
  captureStream,
  createFakePlugin,
  type CapturedStream,
  type FakePlugin,
  type FakePluginOptions,
} from '../fixtures/fake-plugin.js';

const FIXED_NOW = new Date('2026-01-02T03:04:05Z');
const EXPECTED_REPORT = 'PASSED  check-a in 12ms\nERRORED check-b in 5ms\n';

describe('run', () => {
  let tmpDir: string;
  let artifactsDir: string;
  let logFile: string;
  let stdout: CapturedStream;
  let stderr: CapturedStream;
  let transitions: Array<[LifecycleState, LifecycleState]>;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'certkit-run-test-'));
    artifactsDir = join(tmpDir, 'artifacts');
    logFile = join(tmpDir, 'certkit.log');
    stdout = captureStream();
    stderr = captureStream();
    transitions = [];
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeConfig(env: Record<string, string> = {}): Config {
    const config = new Config({ env });
    applyDefaults(config);
    config.setDefault('logfile', logFile);
    config.setDefault('artifacts', artifactsDir);
    return config;
  }

  function setup(pluginOptions: FakePluginOptions = {}, config: Config = makeConfig()): {
    plugin: FakePlugin;
    request: RunRequest;
  } {
    const plugin = createFakePlugin(pluginOptions);
    const registry = new PluginRegistry();
    registry.register(plugin);
    registry.freeze();
    return {
      plugin,
      request: {
        pluginName: plugin.name,
        args: ['quay.io/example/app:1.0'],
        config,
        registry,
        resultWriter: new FileResultWriter(),
        stdout,
        stderr,
        now: () => FIXED_NOW,
        onTransition: (from, to) => transitions.push([from, to]),
      },
    };
  }

  function readLog(): string {
    return readFileSync(logFile, 'utf-8');
  }

  describe('successful run', () => {
    it('calls each stage once, in order, and ends in done', async () => {
      const { plugin, request } = setup();

      const summary = await run(request);

      expect(plugin.calls).toEqual(['init', 'executeChecks', 'results']);
      expect(summary.state).toBe('done');
      expect(summary.submitted).toBe(false);
      expect(transitions).toEqual([
        ['uninitialized', 'initialized'],
        ['initialized', 'checksExecuted'],
        ['checksExecuted', 'resultsCollected'],
        ['resultsCollected', 'done'],
      ]);
    });

    it('passes the leftover args to init', async () => {
      const { plugin, request } = setup();
      await run(request);
      expect(plugin.initArgs).toEqual([['quay.io/example/app:1.0']]);
    });

    it('writes the same report to stdout and results.txt', async () => {
      const { request } = setup();

      const summary = await run(request);

      expect(summary.report).toBe(EXPECTED_REPORT);
      expect(stdout.text()).toBe(EXPECTED_REPORT);
      expect(summary.resultsPath).toBe(join(artifactsDir, 'results.txt'));
      expect(readFileSync(join(artifactsDir, 'results.txt'), 'utf-8')).toBe(EXPECTED_REPORT);
    });

    it('logs the plugin identity to the log file and to stderr', async () => {
      const { request } = setup();
      await run(request);

      const expected = '[03:04:05] INF Calling plugin name=fake-plugin version=1.0.0\n';
      expect(readLog()).toContain(expected);
      expect(stderr.text()).toContain(expected);
    });

    it('tags log lines written by the plugin with emitter=plugin', async () => {
      const { request } = setup({
        onExecute: (ctx) => ctx.logger.info('scanning layers', { count: 3 }),
      });
      await run(request);

      const lines = readLog().split('\n');
      expect(lines).toContain('[03:04:05] INF scanning layers emitter=plugin count=3');
      expect(lines).toContain('[03:04:05] INF Calling plugin name=fake-plugin version=1.0.0');
    });

    it('gives the plugin an artifact writer rooted at the artifacts directory', async () => {
      let written = '';
      const { request } = setup({
        onExecute: (ctx) => {
          written = ctx.artifacts.path();
        },
      });
      await run(request);
      expect(written).toBe(artifactsDir);
    });

    it('produces byte-identical reports across repeated runs', async () => {
      const first = await run(setup().request);
      const firstFile = readFileSync(first.resultsPath, 'utf-8');
      const second = await run(setup().request);
      const secondFile = readFileSync(second.resultsPath, 'utf-8');

      expect(second.report).toBe(first.report);
      expect(secondFile).toBe(firstFile);
    });
  });

  describe('fail-fast', () => {
    it('never calls later stages when init fails', async () => {
      const { plugin, request } = setup({ failAt: 'init' });
      const config = request.config;
      config.set('submit', true);

      await expect(run(request)).rejects.toThrow('init exploded');

      expect(plugin.calls).toEqual(['init']);
      expect(transitions).toEqual([['uninitialized', 'failed']]);
      expect(stdout.text()).toBe('');
    });

    it('rethrows the plugin error unchanged', async () => {
      const boom = new Error('registry unreachable');
      const { request } = setup({
        onInit: () => {
          throw boom;
        },
      });
      await expect(run(request)).rejects.toBe(boom);
    });

    it('logs the failure with plugin identity and stage', async () => {
      const { request } = setup({ failAt: 'init' });
      await expect(run(request)).rejects.toThrow();

      expect(readLog()).toContain(
        '[03:04:05] ERR unable to initialize plugin name=fake-plugin version=1.0.0 stage=init error="init exploded"\n',
      );
    });

    it('calls init exactly once and nothing after executeChecks fails', async () => {
      const { plugin, request } = setup({ failAt: 'executeChecks' });
      request.config.set('submit', true);

      await expect(run(request)).rejects.toThrow('executeChecks exploded');

      expect(plugin.calls).toEqual(['init', 'executeChecks']);
      expect(transitions.at(-1)).toEqual(['initialized', 'failed']);
      expect(readLog()).toContain('ERR unable to execute checks name=fake-plugin');
    });

    it('stops when results cannot be collected', async () => {
      const { plugin, request } = setup({ failAt: 'results' });
      request.config.set('submit', true);

      await expect(run(request)).rejects.toThrow('results exploded');

      expect(plugin.calls).toEqual(['init', 'executeChecks', 'results']);
      expect(stdout.text()).toBe('');
    });

    it('never calls init when the results placeholder cannot be created', async () => {
      mkdirSync(join(artifactsDir, 'results.txt'), { recursive: true });
      const { plugin, request } = setup();

      await expect(run(request)).rejects.toThrow();

      expect(plugin.calls).toEqual([]);
      expect(transitions).toEqual([['uninitialized', 'failed']]);
      expect(readLog()).toContain('ERR unable to create results file');
    });

    it('never calls init when the results file cannot be opened', async () => {
      const refusing: ResultWriter = {
        openFile: async () => {
          throw new Error('read-only filesystem');
        },
      };
      const { plugin, request } = setup();

      await expect(run({ ...request, resultWriter: refusing })).rejects.toThrow('read-only filesystem');
      expect(plugin.calls).toEqual([]);
    });

    it('never calls init when the artifacts directory is unusable', async () => {
      const config = makeConfig();
      config.set('artifacts', join(logFile, 'nested'));
      const { plugin, request } = setup({}, config);

      await expect(run(request)).rejects.toThrow();
      expect(plugin.calls).toEqual([]);
    });

    it('rejects an unknown format before init', async () => {
      const config = makeConfig();
      config.set('format', 'yaml');
      const { plugin, request } = setup({}, config);

      await expect(run(request)).rejects.toBeInstanceOf(UnknownFormatError);
      expect(plugin.calls).toEqual([]);
    });

    it('rejects a plugin name that is not registered', async () => {
      const { plugin, request } = setup();
      await expect(run({ ...request, pluginName: 'check-missing' })).rejects.toBeInstanceOf(PluginNotFoundError);
      expect(plugin.calls).toEqual([]);
    });
  });

  describe('cancellation', () => {
    it('hands the caller signal to the plugin through the execution context', async () => {
      const controller = new AbortController();
      let seen: AbortSignal | undefined;
      let abortedDuringChecks = false;
      const { request } = setup({
        onInit: () => controller.abort('SIGINT'),
        onExecute: (ctx) => {
          seen = ctx.signal;
          abortedDuringChecks = ctx.signal.aborted;
        },
      });

      await run({ ...request, signal: controller.signal });

      expect(seen).toBe(controller.signal);
      expect(abortedDuringChecks).toBe(true);
    });

    it('gives the plugin a signal that is not aborted when the caller passes none', async () => {
      let seen: AbortSignal | undefined;
      const { request } = setup({
        onExecute: (ctx) => {
          seen = ctx.signal;
        },
      });

      await run(request);

      expect(seen).toBeInstanceOf(AbortSignal);
      expect(seen?.aborted).toBe(false);
    });
  });

  describe('submit', () => {
    it('is not called when the submit key is false', async () => {
      const { plugin, request } = setup();
      await run(request);
      expect(plugin.calls).not.toContain('submit');
    });

    it('is called after the report reached both sinks', async () => {
      let stdoutAtSubmit = '';
      let fileAtSubmit = '';
      const { plugin, request } = setup({
        onSubmit: () => {
          stdoutAtSubmit = stdout.text();
          fileAtSubmit = readFileSync(join(artifactsDir, 'results.txt'), 'utf-8');
        },
      });
      request.config.set('submit', true);

      const summary = await run(request);

      expect(plugin.calls).toEqual(['init', 'executeChecks', 'results', 'submit']);
      expect(stdoutAtSubmit).toBe(EXPECTED_REPORT);
      expect(fileAtSubmit).toBe(EXPECTED_REPORT);
      expect(summary.submitted).toBe(true);
      expect(transitions.slice(-2)).toEqual([
        ['resultsCollected', 'submitted'],
        ['submitted', 'done'],
      ]);
    });

    it('reads the submit flag from PFLT_SUBMIT', async () => {
      const { plugin, request } = setup({}, makeConfig({ PFLT_SUBMIT: 'true' }));
      await run(request);
      expect(plugin.calls).toContain('submit');
    });

    it('propagates a submit failure after the report was written', async () => {
      const { request } = setup({ failAt: 'submit' });
      request.config.set('submit', true);

      await expect(run(request)).rejects.toThrow('submit exploded');

      expect(readFileSync(join(artifactsDir, 'results.txt'), 'utf-8')).toBe(EXPECTED_REPORT);
      expect(transitions.at(-1)).toEqual(['resultsCollected', 'failed']);
      expect(readLog()).toContain('ERR unable to call plugin submission name=fake-plugin version=1.0.0 stage=submit');
    });
  });

  describe('best-effort report write', () => {
    it('logs a write failure and still completes, including submit', async () => {
      const brokenStdout = {
        write(): boolean {
          throw new Error('stdout closed');
        },
      };
      const { plugin, request } = setup();
      request.config.set('submit', true);

      const summary = await run({ ...request, stdout: brokenStdout });

      expect(summary.state).toBe('done');
      expect(plugin.calls).toContain('submit');
      expect(readLog()).toContain('WRN unable to write text results name=fake-plugin version=1.0.0');
    });

    it('logs a write error the stream reports asynchronously and still completes', async () => {
      const closedPipe = new Writable({
        write(_chunk, _encoding, callback) {
          callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
        },
      });
      const { plugin, request } = setup();
      request.config.set('submit', true);

      const summary = await run({ ...request, stdout: closedPipe });

      expect(summary.state).toBe('done');
      expect(plugin.calls).toEqual(['init', 'executeChecks', 'results', 'submit']);
      expect(readLog()).toContain(
        `WRN unable to write text results name=fake-plugin version=1.0.0 path=${join(artifactsDir, 'results.txt')} error="write EPIPE"\n`,
      );
    });

    it('leaves the results file empty when stdout fails first', async () => {
      const closedPipe = new Writable({
        write(_chunk, _encoding, callback) {
          callback(new Error('write EPIPE'));
        },
      });
      const { request } = setup();

      await run({ ...request, stdout: closedPipe });

      expect(readFileSync(join(artifactsDir, 'results.txt'), 'utf-8')).toBe('');
    });
  });

  describe('configuration', () => {
    it('keeps plugin mutations out of the caller configuration', async () => {
      const config = makeConfig();
      const { request } = setup(
        {
          onInit: (_ctx, pluginConfig) => {
            pluginConfig.set('artifacts', '/somewhere/else');
            pluginConfig.set('custom-key', 'plugin-value');
          },
        },
        config,
      );

      await run(request);

      expect(config.getString('artifacts')).toBe(artifactsDir);
      expect(config.isSet('custom-key')).toBe(false);
      expect(config.envBinding).toBeUndefined();
    });

    it('hands the plugin a configuration bound to the PFLT_ environment', async () => {
      let seen = '';
      const { request } = setup(
        {
          onInit: (_ctx, pluginConfig) => {
            seen = pluginConfig.getString('docker-config');
          },
        },
        makeConfig({ PFLT_DOCKER_CONFIG: '/home/user/.docker/config.json' }),
      );

      await run(request);
      expect(seen).toBe('/home/user/.docker/config.json');
    });

    it('honours PFLT_LOGFILE and PFLT_ARTIFACTS for the same invocation', async () => {
      const envLog = join(tmpDir, 'from-env.log');
      const envArtifacts = join(tmpDir, 'env-artifacts');
      const { request } = setup({}, makeConfig({ PFLT_LOGFILE: envLog, PFLT_ARTIFACTS: envArtifacts }));

      await run(request);

      expect(existsSync(envLog)).toBe(true);
      expect(existsSync(logFile)).toBe(false);
      expect(readFileSync(join(envArtifacts, 'results.txt'), 'utf-8')).toBe(EXPECTED_REPORT);
    });

    it('keeps the default level when the configured level does not parse', async () => {
      const config = makeConfig();
      config.set('loglevel', 'chatty');
      const { request } = setup({ onExecute: (ctx) => ctx.logger.debug('hidden detail') }, config);

      await run(request);
      expect(readLog()).not.toContain('hidden detail');
    });

    it('logs lifecycle transitions at debug level', async () => {
      const config = makeConfig();
      config.set('loglevel', 'debug');
      const { request } = setup({}, config);

      await run(request);
      expect(readLog()).toContain('DBG Lifecycle transition from=uninitialized to=initialized\n');
    });

    it('writes results.json when the json format is selected', async () => {
      const config = makeConfig();
      config.set('format', 'json');
      const { request } = setup({}, config);

      const summary = await run(request);

      expect(summary.resultsPath).toBe(join(artifactsDir, 'results.json'));
      const parsed: unknown = JSON.parse(readFileSync(summary.resultsPath, 'utf-8'));
      expect(parsed).toEqual({
        plugin: { name: 'fake-plugin', version: '1.0.0' },
        passed_overall: false,
        results: {
          passed: [{ name: 'check-a', elapsed_ms: 12 }],
          failed: [],
          errors: [{ name: 'check-b', elapsed_ms: 5 }],
        },
      });
    });
  });
});
