import { Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { InputEnumerationError } from '@/utils/errors';

import { parseCandidateList, readCandidates } from '../candidate-input';

describe('parseCandidateList', () => {
  it('should read one path per line, ignoring blank lines and CRLF', () => {
    expect(parseCandidateList('a.json\nb.json\r\n\n  c.json  ')).toEqual([
      'a.json',
      'b.json',
      'c.json',
    ]);
  });

  it('should read a JSON array of paths', () => {
    expect(parseCandidateList('["a.json", " b.json ", ""]')).toEqual(['a.json', 'b.json']);
  });

  it('should reject a JSON array of non-strings', () => {
    expect(() => parseCandidateList('[1, 2]', 'CHANGED_FILES')).toThrow(
      'Cannot enumerate candidate files from CHANGED_FILES: expected a JSON array of file paths',
    );
  });

  it('should treat bracketed text that is not JSON as a line list', () => {
    expect(parseCandidateList('[draft].json\nen.json')).toEqual(['[draft].json', 'en.json']);
  });

  it('should return nothing for empty input', () => {
    expect(parseCandidateList('')).toEqual([]);
  });
});

describe('readCandidates', () => {
  const base = { cwd: '/work', env: {}, files: [] };

  it('should prefer explicit files over every other source', async () => {
    await expect(
      readCandidates({ ...base, files: ['x.json'], env: { CHANGED_FILES: 'y.json' } }),
    ).resolves.toEqual(['x.json']);
  });

  it('should read the list from stdin', async () => {
    const stdin = Readable.from(['a.json\n', 'b.json\n']);

    await expect(readCandidates({ ...base, filesFrom: '-', stdin })).resolves.toEqual([
      'a.json',
      'b.json',
    ]);
  });

  it('should report a failing stdin', async () => {
    const stdin = new Readable({
      read() {
        this.destroy(new Error('stream closed'));
      },
    });

    const error: unknown = await readCandidates({ ...base, filesFrom: '-', stdin }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(InputEnumerationError);
    expect(error instanceof Error ? error.message : '').toBe(
      'Cannot enumerate candidate files from stdin: stream closed',
    );
  });

  it('should fall back to CHANGED_FILES', async () => {
    await expect(
      readCandidates({ ...base, env: { CHANGED_FILES: '["languages/en.json","languages/de.json"]' } }),
    ).resolves.toEqual(['languages/en.json', 'languages/de.json']);
  });

  it('should return an empty list without any source', async () => {
    await expect(readCandidates(base)).resolves.toEqual([]);
  });
});
