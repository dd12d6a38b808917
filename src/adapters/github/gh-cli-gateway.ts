import { execa } from 'execa';

import {
  labelChangeFor,
  type PullRequestGateway,
  type PullRequestTarget,
  type ValidationOutcome,
} from '@/core/pull-request/interfaces';
import { GatewayError } from '@/utils/errors';
import { logger } from '@/utils/global-logger';

const GH_TIMEOUT_MS = 30_000;

/**
 * Pull-request gateway backed by the GitHub CLI. Authentication is whatever `gh` is
 * already configured with (GH_TOKEN in CI).
 */
export class GhCliGateway implements PullRequestGateway {
  constructor(private readonly _target: PullRequestTarget) {}

  async submitComment(body: string): Promise<void> {
    await this._gh('comment', ['pr', 'comment', String(this._target.number), '--body-file', '-'], body);
  }

  async applyOutcomeLabel(outcome: ValidationOutcome): Promise<void> {
    const { add, remove } = labelChangeFor(outcome);
    await this._gh('label update', [
      'pr',
      'edit',
      String(this._target.number),
      '--add-label',
      add,
      '--remove-label',
      remove,
    ]);
  }

  private async _gh(operation: string, args: string[], input?: string): Promise<void> {
    const fullArgs =
      this._target.repo !== undefined ? [...args, '--repo', this._target.repo] : args;
    logger.debug(`Running gh ${fullArgs.join(' ')}`);

    try {
      await execa('gh', fullArgs, {
        cwd: this._target.cwd,
        timeout: GH_TIMEOUT_MS,
        ...(input !== undefined ? { input } : {}),
      });
    } catch (error) {
      throw new GatewayError(operation, error);
    }
  }
}
