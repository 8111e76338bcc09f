const UPPERCASE_LATIN_WORD_PATTERN = /^[A-Z]+$/u;
const SURROGATE_PATTERN = /[\uD800-\uDFFF]/;

export function normalizeVocabularyWord(value: string): string {
  return value.trim().toUpperCase();
}

export function isUppercaseLatinWord(value: string): boolean {
  return UPPERCASE_LATIN_WORD_PATTERN.test(value);
}

/**
 * Letters are code points, so a character outside the basic plane fills one cell.
 */
export function splitLetters(word: string): readonly string[] {
  return SURROGATE_PATTERN.test(word) ? Array.from(word) : word.split('');
}

export function wordLength(word: string): number {
  return SURROGATE_PATTERN.test(word) ? Array.from(word).length : word.length;
}

/**
 * Letter at a zero-based offset, or null when the offset falls outside the word.
 */
export function letterAt(word: string, index: number): string | null {
  if (!Number.isInteger(index) || index < 0) {
    return null;
  }

  if (!SURROGATE_PATTERN.test(word)) {
    return index < word.length ? word.charAt(index) : null;
  }

  return Array.from(word)[index] ?? null;
}
