import type { CheckOutcome } from '../plugins/types.js';
import type { ResultFormatter } from './types.js';

const TAG_WIDTH = 'ERRORED'.length;

// Whole milliseconds, never negative; NaN reads as 0.
function wholeMs(elapsedMs: number): number {
  return Math.max(0, Math.trunc(elapsedMs) || 0);
}

function line(tag: string, outcome: CheckOutcome): string {
  return `${tag.padEnd(TAG_WIDTH)} ${outcome.name} in ${wholeMs(outcome.elapsedMs)}ms\n`;
}

/** One line per check: passed first, then failed, then errored. */
export const textFormatter: ResultFormatter = {
  name: 'text',
  fileExtension: 'txt',
  format(results) {
    let out = '';
    for (const outcome of results.passed) out += line('PASSED', outcome);
    for (const outcome of results.failed) out += line('FAILED', outcome);
    for (const outcome of results.errored) out += line('ERRORED', outcome);
    return out;
  },
};
