// Syllable counting for haiku detection

import { dictionary } from 'cmu-pronouncing-dictionary';

export interface SyllableOracle {
  count(word: string): number;
}

const VOWELS = 'aeiouy';
const LETTER = /\p{L}/u;

/**
 * Lowercase and fold accents ("Café" -> "cafe")
 */
function foldCase(word: string): string {
  return word.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

/**
 * Lowercase a token and keep only letters and inner apostrophes
 * ("Don't," -> "don't", "'tis" -> "tis", "naïve" -> "naive")
 */
export function normalizeWord(word: string): string {
  return foldCase(word)
    .replace(/[^\p{L}']/gu, '')
    .replace(/^'+|'+$/g, '');
}

/**
 * Estimate syllables from spelling alone: count vowel groups, drop a
 * silent trailing e. Used for words missing from the dictionary.
 */
export function estimateSyllables(word: string): number {
  const letters = foldCase(word).replace(/\P{L}/gu, '');
  if (letters.length === 0) return 0;

  // Count vowel groups
  let count = 0;
  let prevVowel = false;
  for (const ch of letters) {
    const isVowel = VOWELS.includes(ch);
    if (isVowel && !prevVowel) {
      count++;
    }
    prevVowel = isVowel;
  }

  // Silent e at end
  if (
    count > 1 &&
    letters.length > 1 &&
    letters.endsWith('e') &&
    !VOWELS.includes(letters[letters.length - 2])
  ) {
    count--;
  }

  // Ensure at least 1 syllable
  return Math.max(1, count);
}

/**
 * Count stressed vowels in an ARPAbet pronunciation ("AH0 B R AE1 HH AE2 M")
 */
export function countPhonemeSyllables(pronunciation: string): number {
  return pronunciation
    .split(/\s+/)
    .filter(phoneme => /\d$/.test(phoneme)).length;
}

/**
 * Look the normalised word up in a word list, falling back to the heuristic
 */
abstract class LookupSyllableOracle implements SyllableOracle {
  protected abstract lookup(word: string): number | undefined;

  count(word: string): number {
    const normalized = normalizeWord(word);
    if (!LETTER.test(normalized)) return 0;

    return this.lookup(normalized) ?? estimateSyllables(normalized);
  }
}

/**
 * Syllable counts from the CMU Pronouncing Dictionary. Only the first
 * listed pronunciation is used; variants ("word(2)") are ignored.
 */
export class CmuSyllableOracle extends LookupSyllableOracle {
  protected lookup(word: string): number | undefined {
    const pronunciation = Object.prototype.hasOwnProperty.call(dictionary, word)
      ? dictionary[word]
      : undefined;
    return pronunciation === undefined ? undefined : countPhonemeSyllables(pronunciation);
  }
}

/**
 * Oracle over a fixed vocabulary, for custom word lists and fixtures
 */
export class MapSyllableOracle extends LookupSyllableOracle {
  private readonly counts: ReadonlyMap<string, number>;

  constructor(counts: Readonly<Record<string, number>>) {
    super();
    this.counts = new Map(
      Object.entries(counts).map(([word, count]): [string, number] => [normalizeWord(word), count])
    );
  }

  protected lookup(word: string): number | undefined {
    return this.counts.get(word);
  }
}

/**
 * Layer fixed counts over another oracle
 */
export function withOverrides(
  oracle: SyllableOracle,
  overrides: Readonly<Record<string, number>>
): SyllableOracle {
  const table = new Map(
    Object.entries(overrides).map(([word, count]): [string, number] => [normalizeWord(word), count])
  );
  if (table.size === 0) return oracle;

  return {
    count(word: string): number {
      return table.get(normalizeWord(word)) ?? oracle.count(word);
    },
  };
}

let defaultOracle: CmuSyllableOracle | null = null;

/**
 * Process-wide dictionary oracle without overrides
 */
export function getDefaultSyllableOracle(): SyllableOracle {
  if (!defaultOracle) {
    defaultOracle = new CmuSyllableOracle();
  }
  return defaultOracle;
}

/**
 * Count total syllables in a text
 */
export function countTextSyllables(text: string, oracle: SyllableOracle = getDefaultSyllableOracle()): number {
  const words = text.split(/\s+/).filter(w => w.length > 0);
  return words.reduce((sum, word) => sum + oracle.count(word), 0);
}
