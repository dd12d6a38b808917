/**
 * Process exit codes. Automation reads 1 as "files are broken" and 2 as "the tool is broken".
 */
export const ExitCode = {
  SUCCESS: 0,
  VALIDATION_FAILED: 1,
  INTERNAL_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
