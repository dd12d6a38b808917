import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { type Report, reportSchema } from '@/types/validation';
import { ReportReadError, ReportWriteError, toErrorMessage } from '@/utils/errors';

/**
 * Serialize a report the way downstream steps read it: 2-space JSON, trailing newline
 */
export function formatReport(report: Report): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Write the report artifact, creating parent directories. Returns the absolute path.
 *
 * @throws ReportWriteError when the artifact cannot be written
 */
export async function writeReport(report: Report, path: string): Promise<string> {
  const target = resolve(path);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, formatReport(report), 'utf8');
  } catch (error) {
    throw new ReportWriteError(target, error);
  }
  return target;
}

/**
 * Read a report artifact back and check it has the report shape.
 *
 * @throws ReportReadError when the file is missing, not JSON, or not a report
 */
export async function readReport(path: string): Promise<Report> {
  const target = resolve(path);

  let content: string;
  try {
    content = await readFile(target, 'utf8');
  } catch (error) {
    throw new ReportReadError(target, 'validation results file not found', error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ReportReadError(target, `not valid JSON (${toErrorMessage(error)})`, error);
  }

  const parsed = reportSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ReportReadError(target, `unexpected report shape (${issues})`, parsed.error);
  }
  return parsed.data;
}
