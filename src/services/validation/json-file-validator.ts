import { TextDecoder } from 'node:util';

import { match } from 'ts-pattern';

import type { FileSource } from '@/io/file-source';
import type { FileFailure, FileResult, ValidationTarget } from '@/types/validation';

import { toErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/global-logger';

import { locateParseFailure } from './json-syntax-locator';

export type JsonFileValidatorOptions = {
  encoding: string;
  maxFileSize: number;
};

/**
 * Error line written to the report for a failure
 */
export function describeFailure(failure: FileFailure): string {
  return match(failure)
    .with({ kind: 'not-found' }, () => 'file not found or unreadable')
    .with({ kind: 'too-large' }, ({ limit }) => `file exceeds maximum size of ${limit} bytes`)
    .with({ kind: 'empty' }, () => 'file is empty')
    .with(
      { kind: 'encoding' },
      ({ encoding, details }) => `invalid ${encoding} encoding: ${details}`,
    )
    .with(
      { kind: 'syntax' },
      ({ line, column, offset, reason }) =>
        `JSON syntax error at line ${line}, column ${column} (offset ${offset}): ${reason}`,
    )
    .exhaustive();
}

export function passedResult(file: string): FileResult {
  return { file, success: true, status: 'passed', errors: [] };
}

export function failedResult(file: string, errors: string[]): FileResult {
  return { file, success: false, status: 'failed', errors };
}

export function skippedResult(file: string, reason: string): FileResult {
  return { file, success: false, status: 'skipped', errors: [reason] };
}

/**
 * Byte offset where strict decoding first breaks. Decoding in streaming mode tolerates a
 * truncated trailing sequence but not a malformed one, so failure is monotonic in the
 * prefix length and can be bisected.
 */
function firstMalformedByte(bytes: Uint8Array, encoding: string): number | undefined {
  const failsAt = (length: number): boolean => {
    try {
      new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(
        bytes.subarray(0, length),
        { stream: true },
      );
      return false;
    } catch {
      return true;
    }
  };

  if (!failsAt(bytes.length)) {
    return undefined;
  }

  let low = 1;
  let high = bytes.length;
  while (low < high) {
    const middle = Math.floor((low + high) / 2);
    if (failsAt(middle)) {
      high = middle;
    } else {
      low = middle + 1;
    }
  }
  return low - 1;
}

/**
 * Runs the per-file checks in order: existence, size, emptiness, encoding, JSON syntax.
 * Never throws; every problem is returned as a failed FileResult.
 */
export class JsonFileValidator {
  constructor(
    private readonly _source: FileSource,
    private readonly _options: JsonFileValidatorOptions,
  ) {}

  async validate(file: string): Promise<FileResult> {
    try {
      const failure = await this._check(file);
      if (failure === undefined) {
        logger.debug(`✅ ${file}`);
        return passedResult(file);
      }
      logger.debug(`❌ ${file}: ${failure.kind}`);
      return failedResult(file, [describeFailure(failure)]);
    } catch (error) {
      logger.debug(`💥 Unexpected error while validating ${file}: ${toErrorMessage(error)}`);
      return failedResult(file, [`unexpected error: ${toErrorMessage(error)}`]);
    }
  }

  private async _check(file: string): Promise<FileFailure | undefined> {
    const target = await this._open(file);
    if (target === undefined) {
      return { kind: 'not-found' };
    }
    if (target.size > this._options.maxFileSize) {
      return { kind: 'too-large', limit: this._options.maxFileSize };
    }
    if (target.size === 0) {
      return { kind: 'empty' };
    }

    let bytes: Uint8Array;
    try {
      bytes = await this._source.read(target.resolvedPath);
    } catch {
      return { kind: 'not-found' };
    }

    // The file may have changed between stat and read
    if (bytes.length > this._options.maxFileSize) {
      return { kind: 'too-large', limit: this._options.maxFileSize };
    }
    if (bytes.length === 0) {
      return { kind: 'empty' };
    }

    const decoded = this._decode(bytes, target.encoding);
    if (typeof decoded !== 'string') {
      return decoded;
    }

    try {
      JSON.parse(decoded);
      return undefined;
    } catch (error) {
      return { kind: 'syntax', ...locateParseFailure(decoded, error) };
    }
  }

  private async _open(file: string): Promise<ValidationTarget | undefined> {
    const resolvedPath = this._source.resolve(file);
    try {
      const stats = await this._source.stat(resolvedPath);
      if (!stats.isFile) {
        return undefined;
      }
      return { encoding: this._options.encoding, file, resolvedPath, size: stats.size };
    } catch {
      return undefined;
    }
  }

  private _decode(bytes: Uint8Array, encoding: string): string | FileFailure {
    try {
      // ignoreBOM keeps a leading BOM in the text so the syntax check reports it
      return new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch {
      // Streaming decode only succeeds on the whole input when the last sequence is cut short
      const offset = firstMalformedByte(bytes, encoding);
      const details =
        offset !== undefined
          ? `malformed byte sequence detected at byte offset ${offset}`
          : 'incomplete byte sequence at end of file';
      return { kind: 'encoding', encoding, details };
    }
  }
}
