/**
 * Haiku evaluators. Each one scores a haiku on a single criterion and
 * returns a value in [0, 1]. The built-in ones read the part-of-speech
 * tags (Universal Dependencies) that the tokenizer attached to each word;
 * untagged words match no tag set.
 */

import type { Haiku, Word } from './haiku.js';

export interface HaikuEvaluator {
  readonly name: string;
  evaluate(haiku: Haiku): number;
}

export interface WeightedEvaluator {
  readonly evaluator: HaikuEvaluator;
  readonly weight: number;
}

export function createEvaluator(name: string, evaluate: (haiku: Haiku) => number): HaikuEvaluator {
  return { name, evaluate };
}

// "is" and "has" are AUX, not VERB
const CONTENT_TAGS = new Set(['NOUN', 'PROPN', 'VERB', 'AUX', 'ADJ']);
const JOINING_TAGS = new Set(['ADP', 'DET', 'CCONJ', 'SCONJ', 'PART']);
// Tagged PRON, DET or ADV, but they lean on the next line like a conjunction
const JOINING_WORDS = new Set([
  'who', 'whom', 'whose', 'which', 'what', 'when', 'where', 'why', 'how',
  'my', 'your', 'his', 'its', 'our', 'their',
]);
const NOMINAL_TAGS = new Set(['NOUN', 'PROPN', 'PRON']);
// Prepositions and subordinators ("if", "because", "while")
const PREPOSITION_TAGS = new Set(['ADP', 'SCONJ']);

function hasTag(word: Word | undefined, tags: ReadonlySet<string>): boolean {
  return word?.pos !== undefined && tags.has(word.pos);
}

function isJoiningWord(word: Word | undefined): boolean {
  if (word?.pos === undefined) return false;
  return JOINING_TAGS.has(word.pos) || JOINING_WORDS.has(word.text.toLowerCase());
}

function lastWord(line: readonly Word[]): Word | undefined {
  return line[line.length - 1];
}

function fractionOfLines(haiku: Haiku, predicate: (last: Word | undefined) => boolean): number {
  const matching = haiku.lines.filter(line => predicate(lastWord(line))).length;
  return matching / haiku.lines.length;
}

/**
 * Always returns the same score
 */
export function constantEvaluator(score = 1, name = 'constant'): HaikuEvaluator {
  return createEvaluator(name, () => score);
}

/** Share of lines ending in a noun, verb (auxiliaries included) or adjective */
export const lineEndingPartOfSpeechEvaluator = createEvaluator('line-ending-part-of-speech', haiku =>
  fractionOfLines(haiku, last => hasTag(last, CONTENT_TAGS))
);

/** Share of lines that do not trail off on "in", "and", "the", "which", "their"... */
export const joiningWordLineEndingEvaluator = createEvaluator('joining-word-line-ending', haiku =>
  fractionOfLines(haiku, last => !isJoiningWord(last))
);

/** 1 when the haiku's final word is a noun or pronoun */
export const endsInNounEvaluator = createEvaluator('ends-in-noun', haiku => {
  const words = haiku.words();
  return hasTag(words[words.length - 1], NOMINAL_TAGS) ? 1 : 0;
});

/**
 * Penalise prepositions, sharply: (100 - e^n) / 100 for n prepositions or
 * subordinating conjunctions, floored at 0 (0.99 for none, 0 from five on)
 */
export const prepositionCountEvaluator = createEvaluator('preposition-count', haiku => {
  const found = haiku.words().filter(word => hasTag(word, PREPOSITION_TAGS)).length;
  return Math.max(0, (100 - Math.exp(found)) / 100);
});

export const DEFAULT_HAIKU_EVALUATORS: readonly WeightedEvaluator[] = Object.freeze([
  Object.freeze({ evaluator: lineEndingPartOfSpeechEvaluator, weight: 1 }),
  Object.freeze({ evaluator: joiningWordLineEndingEvaluator, weight: 1 }),
  Object.freeze({ evaluator: endsInNounEvaluator, weight: 1 }),
  Object.freeze({ evaluator: prepositionCountEvaluator, weight: 1 }),
]);
