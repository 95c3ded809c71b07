/**
 * Component: Name Normalization Tests
 */

import { describe, expect, it } from 'vitest';
import { authorKey, normalizeText, normalizeTitle } from '@chaptify/core';

describe('normalizeText', () => {
  it('case-folds and collapses whitespace', () => {
    expect(normalizeText('  The   NAME of  the Wind ')).toBe('the name of the wind');
  });

  it('drops apostrophes instead of splitting words', () => {
    expect(normalizeText("Howl's Moving Castle")).toBe('howls moving castle');
    expect(normalizeText('Howl’s Moving Castle')).toBe('howls moving castle');
  });

  it('strips accents', () => {
    expect(normalizeText('Gabriel García Márquez')).toBe('gabriel garcia marquez');
  });

  it('spells out ampersands and removes punctuation', () => {
    expect(normalizeText('Pride & Prejudice: A Novel!')).toBe('pride and prejudice a novel');
  });

  it('returns an empty string for punctuation only', () => {
    expect(normalizeText(' -- ')).toBe('');
  });
});

describe('normalizeTitle', () => {
  it('removes edition markers', () => {
    expect(normalizeTitle('Dune (Unabridged)')).toBe('dune');
    expect(normalizeTitle('Dune [Abridged]')).toBe('dune');
    expect(normalizeTitle('Dune (Narrated by Simon Vance)')).toBe('dune');
    expect(normalizeTitle('Dune (Full-Cast Edition)')).toBe('dune');
  });

  it('keeps other parenthesised text', () => {
    expect(normalizeTitle('Dune (Book 1)')).toBe('dune book 1');
  });
});

describe('authorKey', () => {
  it('ignores word order and the comma in "Last, First"', () => {
    expect(authorKey('Jones, Diana Wynne')).toBe(authorKey('Diana Wynne Jones'));
    expect(authorKey('Diana Wynne Jones')).toBe('diana jones wynne');
  });
});
