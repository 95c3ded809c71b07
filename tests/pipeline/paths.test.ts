/**
 * Component: Output Path Tests
 */

import { describe, expect, it } from 'vitest';
import { chapterizedPath, isChapterized } from '@chaptify/pipeline';

describe('chapterizedPath', () => {
  it('adds the suffix beside the input', () => {
    expect(chapterizedPath('/books/A - B.m4b')).toBe('/books/A - B_chapterized.m4b');
  });

  it('places the file in another directory', () => {
    expect(chapterizedPath('/books/A - B.m4b', '/out')).toBe('/out/A - B_chapterized.m4b');
  });
});

describe('isChapterized', () => {
  it('recognises earlier outputs', () => {
    expect(isChapterized('/books/A - B_chapterized.m4b')).toBe(true);
    expect(isChapterized('/books/A - B.m4b')).toBe(false);
    expect(isChapterized('/books/chapterized - notes.m4b')).toBe(false);
  });
});
