import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { ConfigurationError, toErrorMessage } from '@/utils/errors';

export const DEFAULT_CONFIG_FILE = 'localegate.config.yaml';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load the YAML config file. The default file is optional; an explicitly named one must exist.
 */
export async function readConfigFile(
  cwd: string,
  explicitPath?: string,
): Promise<Record<string, unknown>> {
  const path = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (explicitPath === undefined && isMissingFile(error)) {
      return {};
    }
    throw new ConfigurationError(`cannot read ${path}: ${toErrorMessage(error)}`, error);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content, { prettyErrors: true, uniqueKeys: true });
  } catch (error) {
    throw new ConfigurationError(`${path} is not valid YAML: ${toErrorMessage(error)}`, error);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${path} must contain a mapping of settings`);
  }
  return parsed;
}
