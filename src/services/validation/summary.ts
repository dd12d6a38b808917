import type { FileResult, Report, Summary } from '@/types/validation';

import { ExitCode } from '@/core/exit-codes';

/**
 * Fold results into counts; every result lands in exactly one bucket
 */
export function summarize(results: readonly FileResult[]): Summary {
  const summary: Summary = { total: 0, passed: 0, failed: 0, skipped: 0 };

  for (const result of results) {
    summary.total++;
    summary[result.status]++;
  }

  return summary;
}

export function buildReport(results: FileResult[], timedOut: boolean): Report {
  const summary = summarize(results);
  return {
    hasErrors: summary.failed > 0 || timedOut,
    timedOut,
    summary,
    results,
  };
}

export function emptyReport(): Report {
  return buildReport([], false);
}

/**
 * Gating signal: non-zero when any file failed or the run ran out of time
 */
export function exitCodeForReport(report: Report): ExitCode {
  return report.summary.failed > 0 || report.timedOut
    ? ExitCode.VALIDATION_FAILED
    : ExitCode.SUCCESS;
}
