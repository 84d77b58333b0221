import type { ResultSet } from '../plugins/types.js';

export interface ReportMeta {
  pluginName: string;
  pluginVersion: string;
}

/** Renders a ResultSet. Rendering is deterministic: the same input always yields the same text. */
export interface ResultFormatter {
  readonly name: string;
  /** Extension of the results file this format is written to, without the dot. */
  readonly fileExtension: string;
  format(results: ResultSet, meta: ReportMeta): string;
}
