import chalk from 'chalk';

import type { Report } from '@/types/validation';
import type { Logger } from '@/utils/logger';

export type SummaryLogger = Pick<Logger, 'debug' | 'error' | 'info' | 'warn'>;

/**
 * Log run totals followed by every file that did not pass
 */
export function logReportSummary(report: Report, log: SummaryLogger): void {
  const { summary } = report;

  if (summary.total === 0) {
    log.info('No files to validate');
    return;
  }

  log.info(chalk.bold('Validation Summary:'));
  log.info(`Total files: ${summary.total}`);
  log.info(chalk.green(`Passed: ${summary.passed}`));
  log.info((summary.failed > 0 ? chalk.red : chalk.green)(`Failed: ${summary.failed}`));
  log.info(`Skipped: ${summary.skipped}`);

  const skipped = report.results.filter((result) => result.status === 'skipped');
  if (skipped.length > 0) {
    log.warn(chalk.yellow(`⏭️ Skipped ${skipped.length} file(s)`));
    for (const result of skipped) {
      log.debug(`${result.file}: ${result.errors.join('; ')}`);
    }
  }

  if (report.timedOut) {
    log.error(chalk.red('⏱️ Validation ran out of time before every file was checked'));
  }

  const failed = report.results.filter((result) => result.status === 'failed');
  if (failed.length === 0) {
    return;
  }

  log.error(chalk.red('Errors found:'));
  for (const result of failed) {
    log.error(`${result.file}:`);
    for (const error of result.errors) {
      log.error(`  - ${error}`);
    }
  }
}
