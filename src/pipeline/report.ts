import { writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';

import type { FailureRecord } from '../types/index.js';

export function failureReportPath(logFile: string): string {
  const name = basename(logFile, extname(logFile));
  return join(dirname(logFile), `FAILURES_${name}.json`);
}

/**
 * Write failures next to the run log as a JSON array of `[path, reason]`
 * pairs. Nothing is written for a clean run; returns the report path or null.
 */
export async function writeFailureReport(
  failures: readonly FailureRecord[],
  logFile: string
): Promise<string | null> {
  if (failures.length === 0) {
    return null;
  }

  const reportPath = failureReportPath(logFile);
  const pairs = failures.map(failure => [failure.path, failure.reason]);
  await writeFile(reportPath, `${JSON.stringify(pairs, null, 2)}\n`, 'utf-8');
  return reportPath;
}
