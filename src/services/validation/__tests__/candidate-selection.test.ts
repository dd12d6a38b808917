import { describe, expect, it } from 'vitest';

import { normalizeCandidates, skipReasonFor } from '../candidate-selection';

describe('normalizeCandidates', () => {
  it('should trim entries and drop blanks', () => {
    expect(normalizeCandidates([' en.json', '', '  ', 'de.json\t'])).toEqual(['en.json', 'de.json']);
  });

  it('should keep the first occurrence of duplicates', () => {
    expect(normalizeCandidates(['b.json', 'a.json', 'b.json'])).toEqual(['b.json', 'a.json']);
  });
});

describe('skipReasonFor', () => {
  it('should accept JSON files regardless of extension case', () => {
    expect(skipReasonFor('locales/EN.JSON', { requireJsonExtension: true })).toBeUndefined();
  });

  it('should skip other extensions when JSON is required', () => {
    expect(skipReasonFor('locales/en.yaml', { requireJsonExtension: true })).toBe(
      'skipped: not a JSON file',
    );
    expect(skipReasonFor('Makefile', { requireJsonExtension: true })).toBe(
      'skipped: not a JSON file',
    );
  });

  it('should accept any extension when JSON is not required', () => {
    expect(skipReasonFor('locales/en.txt', { requireJsonExtension: false })).toBeUndefined();
  });

  it('should skip files outside the target path', () => {
    const policy = { requireJsonExtension: true, targetPath: 'languages/' };

    expect(skipReasonFor('languages/en.json', policy)).toBeUndefined();
    expect(skipReasonFor('./languages/en.json', policy)).toBeUndefined();
    expect(skipReasonFor('src/en.json', policy)).toBe('skipped: outside target path languages/');
  });

  it('should ignore a leading ./ on the target path', () => {
    expect(
      skipReasonFor('languages/en.json', { requireJsonExtension: true, targetPath: './languages' }),
    ).toBeUndefined();
  });

  it('should check the extension before the target path', () => {
    expect(
      skipReasonFor('src/readme.md', { requireJsonExtension: true, targetPath: 'languages/' }),
    ).toBe('skipped: not a JSON file');
  });
});
