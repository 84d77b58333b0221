import type { CheckOutcome } from '../plugins/types.js';
import type { ResultFormatter } from './types.js';

function toEntry(outcome: CheckOutcome): { name: string; elapsed_ms: number } {
  return { name: outcome.name, elapsed_ms: Math.trunc(outcome.elapsedMs) };
}

export const jsonFormatter: ResultFormatter = {
  name: 'json',
  fileExtension: 'json',
  format(results, meta) {
    const report = {
      plugin: { name: meta.pluginName, version: meta.pluginVersion },
      passed_overall: results.failed.length === 0 && results.errored.length === 0,
      results: {
        passed: results.passed.map(toEntry),
        failed: results.failed.map(toEntry),
        errors: results.errored.map(toEntry),
      },
    };
    return `${JSON.stringify(report, null, 2)}\n`;
  },
};
