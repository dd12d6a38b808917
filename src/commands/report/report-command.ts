/**
 * Report command: turn a report artifact into a pull-request comment and label
 */

import { resolve } from 'node:path';

import chalk from 'chalk';

import type { ReportCommandOptions } from '@/types/cli';

import { GhCliGateway } from '@/adapters/github/gh-cli-gateway';
import { BaseCommand, type CommandDependencies } from '@/commands/types';
import { loadValidatorConfig } from '@/core/config/validator-config';
import { ExitCode } from '@/core/exit-codes';
import { PullRequestFeedbackService } from '@/services/pull-request/pull-request-feedback-service';
import {
  type CommentSubject,
  outcomeOf,
  renderPullRequestComment,
} from '@/services/reporting/pull-request-comment';
import { readReport } from '@/services/reporting/report-store';
import { ReportReadError, toErrorMessage } from '@/utils/errors';

export class ReportCommand extends BaseCommand<ReportCommandOptions> {
  constructor(dependencies: CommandDependencies) {
    super('report', 'Render a validation report as a pull-request comment', dependencies);
  }

  async execute(options: ReportCommandOptions): Promise<number> {
    try {
      const input = options.input ?? (await this._configuredResultsFile(options.config));
      const subject = await this._loadSubject(resolve(this.cwd, input));

      if (options.pr === undefined) {
        this.logger.raw(renderPullRequestComment(subject));
        return outcomeOf(subject) === 'passed' ? ExitCode.SUCCESS : ExitCode.VALIDATION_FAILED;
      }

      const target = {
        cwd: this.cwd,
        number: options.pr,
        ...(options.repo !== undefined ? { repo: options.repo } : {}),
      };
      const gateway =
        this.dependencies.services?.createGateway?.(target) ?? new GhCliGateway(target);
      const outcome = await new PullRequestFeedbackService(gateway).publish(subject);

      return outcome === 'passed' ? ExitCode.SUCCESS : ExitCode.VALIDATION_FAILED;
    } catch (error) {
      this.logger.error(chalk.red(`❌ Report command failed: ${toErrorMessage(error)}`));
      return ExitCode.INTERNAL_ERROR;
    }
  }

  /**
   * Results file from the same layered configuration the validate command writes with
   */
  private async _configuredResultsFile(configFile: string | undefined): Promise<string> {
    const config = await loadValidatorConfig({
      cwd: this.cwd,
      env: this.context.env,
      ...(configFile !== undefined ? { configFile } : {}),
    });
    return config.resultsFile;
  }

  private async _loadSubject(path: string): Promise<CommentSubject> {
    try {
      return { kind: 'report', report: await readReport(path) };
    } catch (error) {
      if (error instanceof ReportReadError) {
        this.logger.warn(chalk.yellow(`⚠️ ${error.message}`));
        return { kind: 'error', message: error.message };
      }
      throw error;
    }
  }
}
