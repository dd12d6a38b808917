import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { text } from 'node:stream/consumers';

import { InputEnumerationError } from '@/utils/errors';
import { hasContent, isNonEmptyArray, isStringArray } from '@/validation/guards';

export const CHANGED_FILES_VARIABLE = 'CHANGED_FILES';

export type CandidateInputOptions = {
  cwd: string;
  env: Record<string, string | undefined>;
  /** Explicit paths from the command line */
  files: readonly string[];
  /** File holding the candidate list; '-' reads stdin */
  filesFrom?: string;
  stdin?: NodeJS.ReadableStream;
};

/**
 * Parse a candidate list supplied as text: either a JSON array of paths or one path per line.
 * Blank lines are ignored.
 */
export function parseCandidateList(content: string, source = 'input'): string[] {
  const trimmed = content.trim();

  if (trimmed.startsWith('[')) {
    let structured: unknown;
    try {
      structured = JSON.parse(trimmed);
    } catch {
      structured = undefined;
    }
    if (structured !== undefined) {
      if (!isStringArray(structured)) {
        throw new InputEnumerationError(source, 'expected a JSON array of file paths');
      }
      return structured.filter((entry) => hasContent(entry)).map((entry) => entry.trim());
    }
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Collect candidates from, in order of precedence, positional arguments, a list file (or
 * stdin), or the CHANGED_FILES environment variable. No source yields an empty list.
 */
export async function readCandidates(options: CandidateInputOptions): Promise<string[]> {
  if (isNonEmptyArray(options.files)) {
    return [...options.files];
  }

  if (options.filesFrom !== undefined) {
    if (options.filesFrom === '-') {
      const stream = options.stdin ?? process.stdin;
      let content: string;
      try {
        content = await text(stream);
      } catch (error) {
        throw new InputEnumerationError('stdin', error);
      }
      return parseCandidateList(content, 'stdin');
    }

    const path = resolve(options.cwd, options.filesFrom);
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      throw new InputEnumerationError(path, error);
    }
    return parseCandidateList(content, path);
  }

  const fromEnv = options.env[CHANGED_FILES_VARIABLE];
  if (fromEnv !== undefined) {
    return parseCandidateList(fromEnv, CHANGED_FILES_VARIABLE);
  }

  return [];
}
