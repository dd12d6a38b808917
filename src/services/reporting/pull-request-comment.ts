import { match } from 'ts-pattern';

import type { ValidationOutcome } from '@/core/pull-request/interfaces';
import type { FileResult, Report } from '@/types/validation';

/**
 * What the comment is about: a report that was read, or the reason it could not be
 */
export type CommentSubject = { kind: 'report'; report: Report } | { kind: 'error'; message: string };

export const COMMENT_HEADING = '## JSON Validation Results';

export function outcomeOf(subject: CommentSubject): ValidationOutcome {
  if (subject.kind === 'error') {
    return 'failed';
  }
  return subject.report.hasErrors ? 'failed' : 'passed';
}

function renderResult(result: FileResult): string {
  return match(result.status)
    .with('passed', () => `#### ✅ \`${result.file}\`\nJSON syntax validation passed successfully.\n\n`)
    .with('failed', () => {
      const issues = result.errors.map((error) => `- ${error}\n`).join('');
      return `#### ❌ \`${result.file}\`\nThe following issues were found:\n${issues}\n`;
    })
    .with('skipped', () => {
      const reasons = result.errors.map((reason) => `- ${reason}\n`).join('');
      return `#### ⏭️ \`${result.file}\`\n${reasons}\n`;
    })
    .exhaustive();
}

function renderReport(report: Report): string {
  const { summary } = report;
  if (summary.total === 0) {
    return '⚠️ No JSON files were found in this PR for validation.\n';
  }

  let body = '### Summary\n';
  body += `- Total files validated: ${summary.total}\n`;
  body += `- ✅ Passed: ${summary.passed}\n`;
  body += `- ❌ Failed: ${summary.failed}\n`;
  if (summary.skipped > 0) {
    body += `- ⏭️ Skipped: ${summary.skipped}\n`;
  }
  body += '\n';

  if (report.timedOut) {
    body += '> ⏱️ Validation timed out before every file was checked.\n\n';
  }

  if (report.hasErrors) {
    body += '### Detailed Results\n\n';
    body += report.results.map((result) => renderResult(result)).join('');
  }

  return body;
}

/**
 * Markdown body of the pull-request comment
 */
export function renderPullRequestComment(subject: CommentSubject): string {
  const body = match(subject)
    .with({ kind: 'report' }, ({ report }) => renderReport(report))
    .with(
      { kind: 'error' },
      ({ message }) =>
        `### ❌ Validation Process Error\n\nError details: ${message}\n\nPlease check the workflow logs for more information.\n`,
    )
    .exhaustive();

  return `${COMMENT_HEADING}\n\n${body}`;
}
