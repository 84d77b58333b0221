import { UnknownFormatError } from '../core/errors.js';
import { jsonFormatter } from './json.js';
import { junitFormatter } from './junit.js';
import { textFormatter } from './text.js';
import type { ResultFormatter } from './types.js';

export type { ReportMeta, ResultFormatter } from './types.js';

/** Registry of all available result formats */
export const FORMATTERS: readonly ResultFormatter[] = [textFormatter, jsonFormatter, junitFormatter];

export const FORMAT_NAMES = FORMATTERS.map((f) => f.name);

export function getFormatter(name: string): ResultFormatter {
  const formatter = FORMATTERS.find((f) => f.name === name.trim().toLowerCase());
  if (!formatter) {
    throw new UnknownFormatError(name, FORMAT_NAMES);
  }
  return formatter;
}

/** File the report is written to inside the artifacts directory, e.g. `results.txt`. */
export function resultsFileName(formatter: ResultFormatter): string {
  return `results.${formatter.fileExtension}`;
}
