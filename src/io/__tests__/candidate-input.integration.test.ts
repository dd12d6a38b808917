import { join } from 'node:path';

import { beforeEach, describe, expect, it } from 'vitest';

import { createTempDirectory, writeFiles } from '@test/helpers';

import { readCandidates } from '../candidate-input';

describe('readCandidates from a list file', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDirectory('candidates');
  });

  it('should resolve the list file against the working directory', async () => {
    await writeFiles(directory, { 'changed.txt': 'languages/en.json\nlanguages/fr.json\n' });

    await expect(
      readCandidates({ cwd: directory, env: {}, files: [], filesFrom: 'changed.txt' }),
    ).resolves.toEqual(['languages/en.json', 'languages/fr.json']);
  });

  it('should fail when the list file is missing', async () => {
    await expect(
      readCandidates({ cwd: directory, env: {}, files: [], filesFrom: 'missing.txt' }),
    ).rejects.toThrow(`Cannot enumerate candidate files from ${join(directory, 'missing.txt')}`);
  });
});
