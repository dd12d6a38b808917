import { describe, expect, it } from 'vitest';

import type { FileResult } from '@/types/validation';

import { ExitCode } from '@/core/exit-codes';
import { reportSchema } from '@/types/validation';

import { failedResult, passedResult, skippedResult } from '../json-file-validator';
import { buildReport, emptyReport, exitCodeForReport, summarize } from '../summary';

const MIXED: FileResult[] = [
  passedResult('en.json'),
  failedResult('de.json', ['file is empty']),
  skippedResult('notes.txt', 'skipped: not a JSON file'),
  passedResult('fr.json'),
];

describe('summarize', () => {
  it('should count every result in exactly one bucket', () => {
    expect(summarize(MIXED)).toEqual({ total: 4, passed: 2, failed: 1, skipped: 1 });
  });
});

describe('buildReport', () => {
  it('should flag errors when any file failed', () => {
    const report = buildReport(MIXED, false);

    expect(report.hasErrors).toBe(true);
    expect(reportSchema.safeParse(report).success).toBe(true);
  });

  it('should not flag skipped files as errors', () => {
    const report = buildReport([passedResult('en.json'), skippedResult('a.txt', 'skipped')], false);

    expect(report.hasErrors).toBe(false);
    expect(exitCodeForReport(report)).toBe(ExitCode.SUCCESS);
  });

  it('should flag errors when the run timed out', () => {
    const report = buildReport([skippedResult('en.json', 'skipped: timed out after 5 ms')], true);

    expect(report.hasErrors).toBe(true);
    expect(exitCodeForReport(report)).toBe(ExitCode.VALIDATION_FAILED);
  });
});

describe('exitCodeForReport', () => {
  it('should succeed for an empty run', () => {
    expect(exitCodeForReport(emptyReport())).toBe(ExitCode.SUCCESS);
  });

  it('should fail when a file failed', () => {
    expect(exitCodeForReport(buildReport(MIXED, false))).toBe(ExitCode.VALIDATION_FAILED);
  });
});

describe('reportSchema', () => {
  it('should reject a result whose success flag disagrees with its status', () => {
    const report = {
      ...buildReport([passedResult('en.json')], false),
      results: [{ file: 'en.json', success: false, status: 'passed', errors: [] }],
    };

    expect(reportSchema.safeParse(report).success).toBe(false);
  });

  it('should reject a summary whose total does not add up', () => {
    const report = { ...emptyReport(), summary: { total: 1, passed: 0, failed: 0, skipped: 0 } };

    expect(reportSchema.safeParse(report).success).toBe(false);
  });
});
