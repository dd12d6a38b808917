import { extname } from 'node:path';

import { hasContent } from '@/validation/guards';

export type SelectionPolicy = {
  requireJsonExtension: boolean;
  /** Only candidates under this path prefix are validated */
  targetPath?: string;
};

function stripDotSlash(path: string): string {
  return path.startsWith('./') ? path.slice(2) : path;
}

/**
 * Trim entries, drop blank ones and collapse duplicates onto their first occurrence
 */
export function normalizeCandidates(candidates: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const candidate of candidates) {
    if (!hasContent(candidate)) {
      continue;
    }
    const file = candidate.trim();
    if (!seen.has(file)) {
      seen.add(file);
      normalized.push(file);
    }
  }

  return normalized;
}

/**
 * Reason a candidate is excluded before validation, or undefined if it is validated
 */
export function skipReasonFor(file: string, policy: SelectionPolicy): string | undefined {
  if (policy.requireJsonExtension && extname(file).toLowerCase() !== '.json') {
    return 'skipped: not a JSON file';
  }

  if (policy.targetPath !== undefined) {
    const prefix = stripDotSlash(policy.targetPath);
    if (!stripDotSlash(file).startsWith(prefix)) {
      return `skipped: outside target path ${policy.targetPath}`;
    }
  }

  return undefined;
}
