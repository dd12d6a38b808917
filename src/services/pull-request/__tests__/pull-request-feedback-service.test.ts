import { describe, expect, it, vi } from 'vitest';

import { RecordingGateway } from '@test/helpers';

import { failedResult, passedResult } from '@/services/validation/json-file-validator';
import { buildReport } from '@/services/validation/summary';
import { renderPullRequestComment } from '@/services/reporting/pull-request-comment';
import { GlobalLogger } from '@/utils/global-logger';

import { PullRequestFeedbackService } from '../pull-request-feedback-service';

describe('PullRequestFeedbackService', () => {
  it('should comment and label a passing run', async () => {
    const gateway = new RecordingGateway();
    const subject = { kind: 'report' as const, report: buildReport([passedResult('en.json')], false) };

    const outcome = await new PullRequestFeedbackService(gateway).publish(subject);

    expect(outcome).toBe('passed');
    expect(gateway.comments).toEqual([renderPullRequestComment(subject)]);
    expect(gateway.labels).toEqual(['passed']);
  });

  it('should label a failing run as failed', async () => {
    const gateway = new RecordingGateway();
    const report = buildReport([failedResult('de.json', ['file is empty'])], false);

    const outcome = await new PullRequestFeedbackService(gateway).publish({ kind: 'report', report });

    expect(outcome).toBe('failed');
    expect(gateway.labels).toEqual(['failed']);
  });

  it('should label a process error as failed', async () => {
    const gateway = new RecordingGateway();

    await new PullRequestFeedbackService(gateway).publish({ kind: 'error', message: 'no report' });

    expect(gateway.comments).toHaveLength(1);
    expect(gateway.labels).toEqual(['failed']);
  });

  it('should only warn when the label cannot be applied', async () => {
    const warn = vi.spyOn(GlobalLogger.get(), 'warn');
    const gateway = new RecordingGateway({ labelError: new Error('label not found') });
    const report = buildReport([passedResult('en.json')], false);

    const outcome = await new PullRequestFeedbackService(gateway).publish({ kind: 'report', report });

    expect(outcome).toBe('passed');
    expect(gateway.comments).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith('⚠️ Could not update labels: label not found');
    warn.mockRestore();
  });

  it('should propagate a failed comment without labelling', async () => {
    const gateway = new RecordingGateway({ commentError: new Error('forbidden') });
    const report = buildReport([passedResult('en.json')], false);

    await expect(
      new PullRequestFeedbackService(gateway).publish({ kind: 'report', report }),
    ).rejects.toThrow('forbidden');
    expect(gateway.labels).toEqual([]);
  });
});
