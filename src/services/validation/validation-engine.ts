import pLimit from 'p-limit';

import type { FileSource } from '@/io/file-source';
import type { FileResult, Report } from '@/types/validation';

import { settleWithin } from '@/utils/deadline';
import { logger } from '@/utils/global-logger';

import { normalizeCandidates, type SelectionPolicy, skipReasonFor } from './candidate-selection';
import { JsonFileValidator, skippedResult } from './json-file-validator';
import { buildReport, emptyReport } from './summary';

export type ValidationEngineOptions = {
  encoding: string;
  maxFileSize: number;
  parallelism: number;
  selection: SelectionPolicy;
  timeoutMs?: number;
};

/**
 * Validates a batch of candidate files and aggregates one Report.
 *
 * Files are checked through a worker pool bounded by `parallelism`. Each result is stored
 * at its candidate's index, so the report follows input order whatever order checks
 * finish in. When `timeoutMs` elapses, candidates without a result are reported as
 * skipped and the report is marked timed out.
 */
export class ValidationEngine {
  private readonly _validator: JsonFileValidator;

  constructor(
    source: FileSource,
    private readonly _options: ValidationEngineOptions,
  ) {
    this._validator = new JsonFileValidator(source, {
      encoding: _options.encoding,
      maxFileSize: _options.maxFileSize,
    });
  }

  async run(candidates: readonly string[]): Promise<Report> {
    const files = normalizeCandidates(candidates);
    if (files.length === 0) {
      logger.info('No files to validate');
      return emptyReport();
    }

    const slots: Array<FileResult | undefined> = files.map((file) => {
      const reason = skipReasonFor(file, this._options.selection);
      return reason === undefined ? undefined : skippedResult(file, reason);
    });
    const pending = files.filter((_file, index) => slots[index] === undefined);

    logger.info(
      `🔍 Validating ${pending.length} of ${files.length} file(s) with ${this._options.parallelism} worker(s)`,
    );

    const limit = pLimit(this._options.parallelism);
    let expired = false;

    const checks = files.map(async (file, index) => {
      if (slots[index] !== undefined) {
        return;
      }
      await limit(async () => {
        if (expired) {
          return;
        }
        const result = await this._validator.validate(file);
        if (!expired) {
          slots[index] = result;
        }
      });
    });

    const outcome = await settleWithin(Promise.all(checks), this._options.timeoutMs);
    if (outcome.timedOut) {
      expired = true;
      limit.clearQueue();
      logger.warn(`⏱️ Validation timed out after ${this._options.timeoutMs} ms`);
    }

    const results = files.map(
      (file, index) =>
        slots[index] ?? skippedResult(file, `skipped: timed out after ${this._options.timeoutMs} ms`),
    );

    return buildReport(results, outcome.timedOut);
  }
}
