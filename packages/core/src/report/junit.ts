import { readFile } from 'node:fs/promises';
import type { TestReportSummary } from '@devtasks/shared';
import { ReportError } from '../errors.js';

type Counts = Omit<TestReportSummary, 'passed'>;

const COUNT_KEYS = ['tests', 'failures', 'errors', 'skipped'] as const;

function readAttributes(tag: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of tag.matchAll(/([A-Za-z_:][\w:.-]*)\s*=\s*("([^"]*)"|'([^']*)')/g)) {
    const [, name = '', , doubleQuoted, singleQuoted] = match;
    attributes.set(name, doubleQuoted ?? singleQuoted ?? '');
  }
  return attributes;
}

function readCounts(tag: string): Counts | null {
  const attributes = readAttributes(tag);
  if (!attributes.has('tests')) return null;

  const counts: Counts = { tests: 0, failures: 0, errors: 0, skipped: 0 };
  for (const key of COUNT_KEYS) {
    const value = Number.parseInt(attributes.get(key) ?? '0', 10);
    counts[key] = Number.isNaN(value) ? 0 : value;
  }
  return counts;
}

/**
 * Summarize JUnit XML text. Counts are summed over every <testsuite>;
 * the <testsuites> root is used only when no suite carries counts.
 */
export function summarizeJunit(xml: string, path: string): TestReportSummary {
  const suites = [...xml.matchAll(/<testsuite(?=[\s>/])[^>]*>/g)]
    .map((match) => readCounts(match[0]))
    .filter((counts): counts is Counts => counts !== null);

  let totals: Counts | null = null;
  if (suites.length > 0) {
    totals = suites.reduce<Counts>(
      (sum, counts) => ({
        tests: sum.tests + counts.tests,
        failures: sum.failures + counts.failures,
        errors: sum.errors + counts.errors,
        skipped: sum.skipped + counts.skipped,
      }),
      { tests: 0, failures: 0, errors: 0, skipped: 0 },
    );
  } else {
    const root = /<testsuites(?=[\s>/])[^>]*>/.exec(xml);
    totals = root ? readCounts(root[0]) : null;
  }

  if (!totals) {
    throw new ReportError(path, 'no test counts found in report');
  }

  return {
    ...totals,
    passed: Math.max(0, totals.tests - totals.failures - totals.errors - totals.skipped),
  };
}

export async function readJunitSummary(path: string): Promise<TestReportSummary> {
  let xml: string;
  try {
    xml = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ReportError(path, 'test report was not written');
    }
    throw err;
  }
  return summarizeJunit(xml, path);
}
