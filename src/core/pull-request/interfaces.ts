/**
 * Pass/fail verdict a pull request is labelled with
 */
export type ValidationOutcome = 'passed' | 'failed';

export const OUTCOME_LABELS: Readonly<Record<ValidationOutcome, string>> = {
  passed: 'json-validation-passed',
  failed: 'json-validation-failed',
};

export type LabelChange = {
  add: string;
  remove: string;
};

/**
 * Applying one outcome label always retracts the opposite one
 */
export function labelChangeFor(outcome: ValidationOutcome): LabelChange {
  return outcome === 'passed'
    ? { add: OUTCOME_LABELS.passed, remove: OUTCOME_LABELS.failed }
    : { add: OUTCOME_LABELS.failed, remove: OUTCOME_LABELS.passed };
}

/**
 * Side effects on the pull request under review. Implementations talk to the hosting
 * platform; the validation engine never sees them.
 */
export type PullRequestGateway = {
  applyOutcomeLabel(outcome: ValidationOutcome): Promise<void>;
  submitComment(body: string): Promise<void>;
};

export type PullRequestTarget = {
  cwd: string;
  number: number;
  /** owner/name; defaults to the repository of `cwd` */
  repo?: string;
};
