import { z } from 'zod';

/**
 * Outcome of a single candidate file
 *
 * @remarks
 * - passed: decoded and parsed as one JSON value
 * - failed: missing, too large, empty, badly encoded or not valid JSON
 * - skipped: excluded by the selection policy, or never checked before the deadline
 */
export const fileStatusSchema = z.enum(['passed', 'failed', 'skipped']);

export type FileStatus = z.infer<typeof fileStatusSchema>;

/**
 * Why a file failed. Each failure becomes exactly one error line in the report.
 */
export type FileFailure =
  | { kind: 'empty' }
  | { details: string; encoding: string; kind: 'encoding' }
  | { kind: 'not-found' }
  | { column: number; kind: 'syntax'; line: number; offset: number; reason: string }
  | { kind: 'too-large'; limit: number };

export type FileFailureKind = FileFailure['kind'];

export const fileResultSchema = z
  .object({
    errors: z.array(z.string()).describe('Human-readable problems, in the order found'),
    file: z.string().min(1).describe('Candidate path exactly as it was submitted'),
    status: fileStatusSchema,
    success: z.boolean(),
  })
  .refine((result) => result.success === (result.status === 'passed'), {
    message: 'success must be true exactly when status is passed',
    path: ['success'],
  });

export type FileResult = z.infer<typeof fileResultSchema>;

export const summarySchema = z
  .object({
    failed: z.number().int().nonnegative(),
    passed: z.number().int().nonnegative(),
    skipped: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
  })
  .refine((summary) => summary.total === summary.passed + summary.failed + summary.skipped, {
    message: 'total must equal passed + failed + skipped',
    path: ['total'],
  });

export type Summary = z.infer<typeof summarySchema>;

/**
 * The single artifact of a validation run
 *
 * @example
 * ```typescript
 * const report: Report = {
 *   hasErrors: true,
 *   timedOut: false,
 *   summary: { total: 2, passed: 1, failed: 1, skipped: 0 },
 *   results: [
 *     { file: 'languages/en.json', success: true, status: 'passed', errors: [] },
 *     { file: 'languages/de.json', success: false, status: 'failed', errors: ['file is empty'] },
 *   ],
 * };
 * ```
 */
export const reportSchema = z.object({
  hasErrors: z.boolean(),
  results: z.array(fileResultSchema),
  summary: summarySchema,
  timedOut: z.boolean(),
});

export type Report = z.infer<typeof reportSchema>;

/**
 * Metadata of a candidate that exists on disk
 */
export type ValidationTarget = {
  encoding: string;
  /** Path as submitted, used in the report */
  file: string;
  /** Path the file source actually reads */
  resolvedPath: string;
  size: number;
};
