/**
 * Library entry point for embedding the validator in other tooling
 */

export { GhCliGateway } from './adapters/github/gh-cli-gateway';
export { run } from './cli';
export {
  canonicalEncoding,
  configFromEnv,
  DEFAULT_ENCODING,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_PARALLELISM,
  DEFAULT_RESULTS_FILE,
  loadValidatorConfig,
  type LoadValidatorConfigOptions,
  type ValidatorConfig,
  type ValidatorConfigInput,
} from './core/config/validator-config';
export { ExitCode } from './core/exit-codes';
export {
  labelChangeFor,
  OUTCOME_LABELS,
  type PullRequestGateway,
  type PullRequestTarget,
  type ValidationOutcome,
} from './core/pull-request/interfaces';
export { parseCandidateList, readCandidates } from './io/candidate-input';
export { type FileSource, type FileStat, NodeFileSource } from './io/file-source';
export { PullRequestFeedbackService } from './services/pull-request/pull-request-feedback-service';
export { logReportSummary } from './services/reporting/console-summary';
export {
  type CommentSubject,
  outcomeOf,
  renderPullRequestComment,
} from './services/reporting/pull-request-comment';
export { formatReport, readReport, writeReport } from './services/reporting/report-store';
export { type SelectionPolicy } from './services/validation/candidate-selection';
export { describeFailure, JsonFileValidator } from './services/validation/json-file-validator';
export { lineColumnAt, locateSyntaxError } from './services/validation/json-syntax-locator';
export { buildReport, exitCodeForReport, summarize } from './services/validation/summary';
export {
  ValidationEngine,
  type ValidationEngineOptions,
} from './services/validation/validation-engine';
export type { FileFailure, FileResult, FileStatus, Report, Summary } from './types/validation';
export * from './utils/errors';
