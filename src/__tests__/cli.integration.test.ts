import { join } from 'node:path';

import { beforeEach, describe, expect, it } from 'vitest';

import { createTempDirectory, RecordingLogger, writeFiles } from '@test/helpers';

import { ExitCode } from '@/core/exit-codes';
import { readReport } from '@/services/reporting/report-store';

import { run } from '../cli';

describe('localegate CLI', () => {
  let testDir: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    testDir = await createTempDirectory('cli');
    logger = new RecordingLogger();
    await writeFiles(testDir, {
      'languages/en.json': '{"hello": "Hello"}',
      'languages/fr.json': '{"hello": ',
    });
  });

  it('should validate files given as arguments', async () => {
    const exitCode = await run(
      ['validate', 'languages/en.json', '--silent', '--output', 'report.json'],
      { context: { cwd: testDir, env: {}, logger } },
    );

    expect(exitCode).toBe(ExitCode.SUCCESS);
    const report = await readReport(join(testDir, 'report.json'));
    expect(report.summary.passed).toBe(1);
  });

  it('should exit with 1 when validation fails', async () => {
    const exitCode = await run(['validate', 'languages/en.json', 'languages/fr.json', '--silent'], {
      context: { cwd: testDir, env: {}, logger },
    });

    expect(exitCode).toBe(ExitCode.VALIDATION_FAILED);
  });

  it('should print a process error comment when no report exists', async () => {
    const exitCode = await run(['report', '--silent'], {
      context: { cwd: testDir, env: {}, logger },
    });

    expect(exitCode).toBe(ExitCode.VALIDATION_FAILED);
    expect(logger.messages('raw')[0]).toContain('### ❌ Validation Process Error');
  });

  it('should report from the results file configured through RESULTS_FILE', async () => {
    const context = { cwd: testDir, env: { RESULTS_FILE: 'out/results.json' }, logger };

    await expect(run(['validate', 'languages/en.json', '--silent'], { context })).resolves.toBe(
      ExitCode.SUCCESS,
    );
    await expect(run(['report', '--silent'], { context })).resolves.toBe(ExitCode.SUCCESS);

    const report = await readReport(join(testDir, 'out/results.json'));
    expect(report.summary.passed).toBe(1);
    expect(logger.messages('raw')[0]).toContain('### Summary');
  });

  it('should exit with 2 for invalid option values', async () => {
    await expect(
      run(['validate', '--parallelism', 'many', '--silent'], {
        context: { cwd: testDir, env: {}, logger },
      }),
    ).resolves.toBe(ExitCode.INTERNAL_ERROR);
    await expect(
      run(['report', '--pr', '0'], { context: { cwd: testDir, env: {}, logger } }),
    ).resolves.toBe(ExitCode.INTERNAL_ERROR);
  });

  it('should reject combining file arguments with --files-from', async () => {
    const exitCode = await run(
      ['validate', 'languages/en.json', '--files-from', 'list.txt', '--silent'],
      { context: { cwd: testDir, env: {}, logger } },
    );

    expect(exitCode).toBe(ExitCode.INTERNAL_ERROR);
  });
});
