import { matrixEntryId } from '@devtasks/shared';
import type { MatrixConfig, MatrixEntry, ProjectLayout } from '@devtasks/shared';
import { platformForRunner } from '../platform/detect.js';

/**
 * Cross product of OS labels and interpreter versions, minus exclusions.
 * An exclusion matches when every key it sets matches.
 */
export function expandMatrix(matrix: MatrixConfig): MatrixEntry[] {
  const entries: MatrixEntry[] = [];

  for (const os of matrix.os) {
    for (const python of matrix.python) {
      const excluded = matrix.exclude.some(
        (rule) => (rule.os === undefined || rule.os === os) && (rule.python === undefined || rule.python === python),
      );
      if (excluded) continue;

      entries.push({ id: matrixEntryId(os, python), os, platform: platformForRunner(os), python });
    }
  }

  return entries;
}

/** Insert the entry id before the file extension: report.xml -> report.<id>.xml */
function withSuffix(path: string, id: string): string {
  const slash = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  const dot = path.lastIndexOf('.');
  if (dot > slash + 1) {
    return `${path.slice(0, dot)}.${id}${path.slice(dot)}`;
  }
  return `${path}.${id}`;
}

/**
 * Layout for one matrix entry: its own environment, test report and
 * distribution directory, so entries never share a mutable path.
 */
export function layoutForEntry(layout: ProjectLayout, entry: MatrixEntry): ProjectLayout {
  return {
    ...layout,
    venvDir: `${layout.venvDir}-${entry.id}`,
    testReport: withSuffix(layout.testReport, entry.id),
    distDir: `${layout.distDir.replace(/[\\/]+$/, '')}/${entry.id}`,
  };
}
