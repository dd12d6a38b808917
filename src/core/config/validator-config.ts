import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { TextDecoder } from 'node:util';

import { z } from 'zod';

import { readConfigFile } from '@/io/config-file';
import { ConfigurationError } from '@/utils/errors';

export const DEFAULT_ENCODING = 'utf-8';
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
export const DEFAULT_PARALLELISM = 4;
export const DEFAULT_RESULTS_FILE = 'validation-results.json';

/**
 * Canonical name of an encoding label, or undefined when the runtime cannot decode it
 */
export function canonicalEncoding(label: string): string | undefined {
  try {
    return new TextDecoder(label).encoding;
  } catch {
    return undefined;
  }
}

const booleanSetting = z.union([
  z.boolean(),
  z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1'),
]);

export const validatorConfigSchema = z
  .object({
    encoding: z
      .string()
      .trim()
      .default(DEFAULT_ENCODING)
      .transform((label, context) => {
        const encoding = canonicalEncoding(label);
        if (encoding === undefined) {
          context.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unsupported encoding "${label}"`,
          });
          return z.NEVER;
        }
        return encoding;
      }),
    maxFileSize: z.coerce.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
    parallelism: z.coerce.number().int().min(1).max(256).default(DEFAULT_PARALLELISM),
    requireJsonExtension: booleanSetting.default(true),
    resultsFile: z.string().min(1).default(DEFAULT_RESULTS_FILE),
    rootDir: z.string().min(1).default('.'),
    targetPath: z.string().min(1).optional(),
    timeoutMs: z.coerce.number().int().positive().optional(),
  })
  .strict();

export type ValidatorConfig = z.infer<typeof validatorConfigSchema>;

export type ValidatorConfigInput = z.input<typeof validatorConfigSchema>;

const ENV_VARIABLES = {
  encoding: 'FILE_ENCODING',
  maxFileSize: 'MAX_FILE_SIZE',
  parallelism: 'PARALLEL_WORKERS',
  requireJsonExtension: 'REQUIRE_JSON_EXTENSION',
  resultsFile: 'RESULTS_FILE',
  targetPath: 'TARGET_PATH',
  timeoutMs: 'VALIDATION_TIMEOUT_MS',
} as const satisfies Partial<Record<keyof ValidatorConfig, string>>;

/**
 * Settings read from the environment. Unset or blank variables are left out so lower
 * layers show through.
 */
export function configFromEnv(env: Record<string, string | undefined>): Record<string, string> {
  const layer: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_VARIABLES)) {
    const value = env[name]?.trim();
    if (value !== undefined && value.length > 0) {
      layer[key] = value;
    }
  }
  return layer;
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export type LoadValidatorConfigOptions = {
  /** Explicit config file; the default file is used when present */
  configFile?: string;
  cwd: string;
  env: Record<string, string | undefined>;
  /** Highest-precedence settings, usually CLI flags */
  overrides?: ValidatorConfigInput;
};

/**
 * Build the run configuration once: defaults, then config file, then environment, then
 * overrides. The result is frozen and `rootDir` is absolute.
 */
export async function loadValidatorConfig(
  options: LoadValidatorConfigOptions,
): Promise<Readonly<ValidatorConfig>> {
  const fileLayer = await readConfigFile(options.cwd, options.configFile);
  const merged = {
    ...fileLayer,
    ...configFromEnv(options.env),
    ...definedEntries(options.overrides ?? {}),
  };

  const parsed = validatorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(details, parsed.error);
  }

  const rootDir = resolve(options.cwd, parsed.data.rootDir);
  let isDirectory = false;
  try {
    isDirectory = (await stat(rootDir)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new ConfigurationError(`root directory ${rootDir} does not exist or is not a directory`);
  }

  return Object.freeze({ ...parsed.data, rootDir });
}
