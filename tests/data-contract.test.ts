import { describe, expect, it } from 'vitest';

import {
  isUppercaseLatinWord,
  letterAt,
  normalizeVocabularyWord,
  splitLetters,
  wordLength,
} from '../src/domain/data-contract';

describe('data contract helpers', () => {
  it('normalizes vocabulary words to trimmed uppercase', () => {
    expect(normalizeVocabularyWord('  Cat  ')).toBe('CAT');
    expect(normalizeVocabularyWord('tar')).toBe('TAR');
  });

  it('accepts only uppercase A-Z words', () => {
    expect(isUppercaseLatinWord('CROSSWORD')).toBe(true);
    expect(isUppercaseLatinWord('Crossword')).toBe(false);
    expect(isUppercaseLatinWord('CROSS-WORD')).toBe(false);
    expect(isUppercaseLatinWord('')).toBe(false);
  });

  it('reads letters at valid offsets only', () => {
    expect(letterAt('CAT', 0)).toBe('C');
    expect(letterAt('CAT', 2)).toBe('T');
    expect(letterAt('CAT', 3)).toBeNull();
    expect(letterAt('CAT', -1)).toBeNull();
    expect(letterAt('CAT', 1.5)).toBeNull();
  });

  it('counts characters outside the basic plane as single letters', () => {
    const word = 'A\u{1F600}B';

    expect(word.length).toBe(4);
    expect(wordLength(word)).toBe(3);
    expect(splitLetters(word)).toEqual(['A', '\u{1F600}', 'B']);
    expect(letterAt(word, 1)).toBe('\u{1F600}');
    expect(letterAt(word, 2)).toBe('B');
    expect(letterAt(word, 3)).toBeNull();
  });
});
