import type { CheckOutcome } from '../plugins/types.js';
import type { ResultFormatter } from './types.js';

/**
 * Escape XML special characters.
 */
function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function seconds(ms: number): string {
  return (Math.trunc(ms) / 1000).toFixed(3);
}

function totalMs(outcomes: CheckOutcome[]): number {
  return outcomes.reduce((sum, o) => sum + Math.trunc(o.elapsedMs), 0);
}

/**
 * Results as JUnit XML for Jenkins/GitLab CI integration.
 *
 * The plugin becomes one test suite and each check a test case. Failed checks
 * carry a <failure>, errored checks an <error>.
 */
export const junitFormatter: ResultFormatter = {
  name: 'junit',
  fileExtension: 'xml',
  format(results, meta) {
    const all = [...results.passed, ...results.failed, ...results.errored];
    const suite = escapeXml(meta.pluginName);
    const time = seconds(totalMs(all));
    const counts = `tests="${all.length}" failures="${results.failed.length}" errors="${results.errored.length}"`;

    let xml = `<?xml version="1.0" encoding="UTF-8"?>\n`;
    xml += `<testsuites name="${suite}" ${counts} time="${time}">\n`;
    xml += `  <testsuite name="${suite}" ${counts} time="${time}">\n`;
    xml += `    <properties>\n`;
    xml += `      <property name="plugin.version" value="${escapeXml(meta.pluginVersion)}" />\n`;
    xml += `    </properties>\n`;

    const testcase = (outcome: CheckOutcome, body?: string): void => {
      const attrs = `name="${escapeXml(outcome.name)}" classname="${suite}" time="${seconds(outcome.elapsedMs)}"`;
      if (body === undefined) {
        xml += `    <testcase ${attrs} />\n`;
        return;
      }
      xml += `    <testcase ${attrs}>\n`;
      xml += `      ${body}\n`;
      xml += `    </testcase>\n`;
    };

    for (const outcome of results.passed) testcase(outcome);
    for (const outcome of results.failed) {
      testcase(outcome, `<failure message="${escapeXml(outcome.name)} failed" type="FAILED" />`);
    }
    for (const outcome of results.errored) {
      testcase(outcome, `<error message="${escapeXml(outcome.name)} errored" type="ERRORED" />`);
    }

    xml += `  </testsuite>\n`;
    xml += `</testsuites>\n`;
    return xml;
  },
};
