/**
 * Validate command: check candidate locale files, write the report, return the gate
 */

import { resolve } from 'node:path';

import chalk from 'chalk';

import type { ValidateCommandOptions } from '@/types/cli';

import { BaseCommand, type CommandDependencies } from '@/commands/types';
import { loadValidatorConfig } from '@/core/config/validator-config';
import { ExitCode } from '@/core/exit-codes';
import { readCandidates } from '@/io/candidate-input';
import { NodeFileSource } from '@/io/file-source';
import { logReportSummary } from '@/services/reporting/console-summary';
import { writeReport } from '@/services/reporting/report-store';
import { exitCodeForReport } from '@/services/validation/summary';
import { ValidationEngine } from '@/services/validation/validation-engine';
import { toErrorMessage } from '@/utils/errors';

export class ValidateCommand extends BaseCommand<ValidateCommandOptions> {
  constructor(dependencies: CommandDependencies) {
    super(
      'validate',
      'Validate candidate JSON files and write a machine-readable report',
      dependencies,
    );
  }

  async execute(options: ValidateCommandOptions): Promise<number> {
    try {
      const config = await loadValidatorConfig({
        cwd: this.cwd,
        env: this.context.env,
        ...(options.config !== undefined ? { configFile: options.config } : {}),
        overrides: {
          encoding: options.encoding,
          maxFileSize: options.maxFileSize,
          parallelism: options.parallelism,
          requireJsonExtension: options.allowAnyExtension ? false : undefined,
          rootDir: options.rootDir,
          targetPath: options.targetPath,
          timeoutMs: options.timeout,
        },
      });
      this.logger.debug(`Configuration: ${JSON.stringify(config)}`);

      const candidates = await readCandidates({
        cwd: this.cwd,
        env: this.context.env,
        files: options.files,
        ...(options.filesFrom !== undefined ? { filesFrom: options.filesFrom } : {}),
        ...(this.context.stdin !== undefined ? { stdin: this.context.stdin } : {}),
      });
      this.logger.info(chalk.blue(`📄 Found ${candidates.length} candidate file(s)`));

      const source =
        this.dependencies.services?.createFileSource?.(config.rootDir) ??
        new NodeFileSource(config.rootDir);
      const engine = new ValidationEngine(source, {
        encoding: config.encoding,
        maxFileSize: config.maxFileSize,
        parallelism: config.parallelism,
        selection: {
          requireJsonExtension: config.requireJsonExtension,
          ...(config.targetPath !== undefined ? { targetPath: config.targetPath } : {}),
        },
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      });

      const report = await engine.run(candidates);
      logReportSummary(report, this.logger);

      const reportPath = await writeReport(
        report,
        resolve(this.cwd, options.output ?? config.resultsFile),
      );
      this.logger.info(chalk.green(`📝 Report written to: ${reportPath}`));

      const exitCode = exitCodeForReport(report);
      if (exitCode === ExitCode.SUCCESS) {
        this.logger.info(chalk.green('✅ All validated files passed'));
      }
      return exitCode;
    } catch (error) {
      this.logger.error(chalk.red(`❌ Validate command failed: ${toErrorMessage(error)}`));
      return ExitCode.INTERNAL_ERROR;
    }
  }
}
