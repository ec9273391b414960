// Haiku detection over a token stream

import { logHaikuScan } from '@haiku-finder/common';
import { Haiku, HAIKU_PATTERN } from './haiku.js';
import type { Word } from './haiku.js';
import type { SyllableOracle } from './syllables.js';
import type { Token } from './tokenizer.js';

export interface ScanOptions {
  /** Let one haiku cover several sentences */
  allowSentenceSpanning?: boolean;
  logEvents?: boolean;
}

/**
 * Attach syllable counts to tokens. Tokens that count zero syllables
 * are dropped and end the run, so no haiku line closes over the gap
 * they leave.
 */
export function toWords(tokens: readonly Token[], oracle: SyllableOracle): Word[] {
  const words: Word[] = [];
  let breaks = 0;
  for (const token of tokens) {
    const syllables = oracle.count(token.text);
    if (syllables === 0) {
      breaks++;
      continue;
    }
    words.push({ ...token, sentence: token.sentence + breaks, syllables, index: words.length });
  }
  return words;
}

/**
 * Greedily take words from `from` until exactly `target` syllables.
 * Returns null on overshoot, end of input, or (when `sentence` is set)
 * reaching a word of another sentence.
 */
function takeLine(
  words: readonly Word[],
  from: number,
  target: number,
  sentence: number | null
): Word[] | null {
  let sum = 0;
  for (let i = from; i < words.length; i++) {
    if (sentence !== null && words[i].sentence !== sentence) return null;
    sum += words[i].syllables;
    if (sum === target) return words.slice(from, i + 1);
    if (sum > target) return null;
  }
  return null;
}

/**
 * Find every 5-7-5 window, one attempt per start word, in start order.
 * Windows may overlap.
 */
export function findHaikus(words: readonly Word[], options: ScanOptions = {}): Haiku[] {
  const [firstTarget, secondTarget, thirdTarget] = HAIKU_PATTERN;
  const haikus: Haiku[] = [];

  for (let start = 0; start < words.length; start++) {
    const sentence = options.allowSentenceSpanning ? null : words[start].sentence;

    const first = takeLine(words, start, firstTarget, sentence);
    if (!first) continue;
    const second = takeLine(words, start + first.length, secondTarget, sentence);
    if (!second) continue;
    const third = takeLine(words, start + first.length + second.length, thirdTarget, sentence);
    if (!third) continue;

    haikus.push(new Haiku([first, second, third], { logEvents: options.logEvents }));
  }

  return haikus;
}

/**
 * findHaikus, logging one scan event when asked
 */
export function scanWords(words: readonly Word[], options: ScanOptions = {}): Haiku[] {
  const startedAt = Date.now();
  const haikus = findHaikus(words, options);

  if (options.logEvents) {
    logHaikuScan(words.length, haikus.length, Date.now() - startedAt, {
      sentenceSpanning: options.allowSentenceSpanning ?? false,
    });
  }

  return haikus;
}

/**
 * Count syllables for a token stream and find its haikus
 */
export function scanHaikus(
  tokens: readonly Token[],
  oracle: SyllableOracle,
  options: ScanOptions = {}
): Haiku[] {
  return scanWords(toWords(tokens, oracle), options);
}
