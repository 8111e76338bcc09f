import { isUppercaseLatinWord, normalizeVocabularyWord } from '../data-contract';

export const VOCABULARY_REJECT_REASONS = ['empty-word', 'invalid-characters', 'duplicate-word'] as const;

export type VocabularyRejectReason = (typeof VOCABULARY_REJECT_REASONS)[number];

type RejectCounters = Record<VocabularyRejectReason, number>;

interface MutableVocabularyStats {
  totalWords: number;
  acceptedWords: number;
  rejectedWords: number;
  rejectedByReason: RejectCounters;
}

export interface VocabularyStats {
  readonly totalWords: number;
  readonly acceptedWords: number;
  readonly rejectedWords: number;
  readonly rejectedByReason: Readonly<Record<VocabularyRejectReason, number>>;
}

export interface NormalizedVocabulary {
  readonly words: ReadonlySet<string>;
  readonly stats: VocabularyStats;
}

function createRejectCounters(): RejectCounters {
  return {
    'empty-word': 0,
    'invalid-characters': 0,
    'duplicate-word': 0,
  };
}

function classifyWord(
  normalizedWord: string,
  acceptedWords: ReadonlySet<string>,
): VocabularyRejectReason | null {
  if (normalizedWord.length === 0) {
    return 'empty-word';
  }

  if (!isUppercaseLatinWord(normalizedWord)) {
    return 'invalid-characters';
  }

  if (acceptedWords.has(normalizedWord)) {
    return 'duplicate-word';
  }

  return null;
}

/**
 * Normalizes raw words to trimmed uppercase A-Z and drops the rest, keeping the
 * first-seen order of accepted words.
 */
export function createVocabulary(rawWords: Iterable<string>): NormalizedVocabulary {
  const words = new Set<string>();
  const stats: MutableVocabularyStats = {
    totalWords: 0,
    acceptedWords: 0,
    rejectedWords: 0,
    rejectedByReason: createRejectCounters(),
  };

  for (const rawWord of rawWords) {
    stats.totalWords += 1;

    const normalizedWord = normalizeVocabularyWord(rawWord);
    const rejectReason = classifyWord(normalizedWord, words);

    if (rejectReason) {
      stats.rejectedWords += 1;
      stats.rejectedByReason[rejectReason] += 1;
      continue;
    }

    words.add(normalizedWord);
    stats.acceptedWords += 1;
  }

  return {
    words,
    stats: {
      totalWords: stats.totalWords,
      acceptedWords: stats.acceptedWords,
      rejectedWords: stats.rejectedWords,
      rejectedByReason: { ...stats.rejectedByReason },
    },
  };
}
