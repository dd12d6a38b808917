import { z } from 'zod';

const positiveInteger = z.coerce.number().int().positive();

const commonOptionsSchema = z.object({
  silent: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

// Validate command options schema
export const ValidateCommandOptionsSchema = commonOptionsSchema
  .extend({
    allowAnyExtension: z.boolean().default(false),
    config: z.string().min(1, 'Config file path cannot be empty').optional(),
    encoding: z.string().min(1, 'Encoding cannot be empty').optional(),
    files: z.array(z.string()).default([]),
    filesFrom: z.string().min(1, 'List file path cannot be empty').optional(),
    maxFileSize: positiveInteger.optional(),
    output: z.string().min(1, 'Output file path cannot be empty').optional(),
    parallelism: positiveInteger.optional(),
    rootDir: z.string().min(1, 'Root directory cannot be empty').optional(),
    targetPath: z.string().min(1, 'Target path cannot be empty').optional(),
    timeout: positiveInteger.optional(),
  })
  .refine((data) => !(data.files.length > 0 && data.filesFrom !== undefined), {
    message: 'Cannot combine file arguments with --files-from (mutually exclusive)',
    path: ['files', 'filesFrom'],
  });
export type ValidateCommandOptions = z.infer<typeof ValidateCommandOptionsSchema>;

// Report command options schema
export const ReportCommandOptionsSchema = commonOptionsSchema.extend({
  config: z.string().min(1, 'Config file path cannot be empty').optional(),
  /** Defaults to the configured results file */
  input: z.string().min(1, 'Report path cannot be empty').optional(),
  pr: positiveInteger.optional(),
  repo: z
    .string()
    .regex(/^[\w.-]+\/[\w.-]+$/, 'Repository must look like owner/name')
    .optional(),
});
export type ReportCommandOptions = z.infer<typeof ReportCommandOptionsSchema>;

export function validateValidateArgs(raw: unknown): ValidateCommandOptions {
  return ValidateCommandOptionsSchema.parse(raw);
}

export function validateReportArgs(raw: unknown): ReportCommandOptions {
  return ReportCommandOptionsSchema.parse(raw);
}
