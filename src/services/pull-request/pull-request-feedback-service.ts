import type { PullRequestGateway, ValidationOutcome } from '@/core/pull-request/interfaces';

import {
  type CommentSubject,
  outcomeOf,
  renderPullRequestComment,
} from '@/services/reporting/pull-request-comment';
import { toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/global-logger';

/**
 * Publishes a validation outcome to a pull request: one comment, then the outcome label.
 *
 * A failed comment propagates. A failed label change is only logged.
 */
export class PullRequestFeedbackService {
  constructor(private readonly _gateway: PullRequestGateway) {}

  async publish(subject: CommentSubject): Promise<ValidationOutcome> {
    const outcome = outcomeOf(subject);

    await this._gateway.submitComment(renderPullRequestComment(subject));
    logger.info('💬 Posted validation results comment');

    try {
      await this._gateway.applyOutcomeLabel(outcome);
      logger.info(`🏷️ Labelled pull request as ${outcome}`);
    } catch (error) {
      logger.warn(`⚠️ Could not update labels: ${toErrorMessage(error)}`);
    }

    return outcome;
  }
}
