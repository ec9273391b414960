// Sentence and word segmentation

import winkNLP from 'wink-nlp';
import type { ItemSentence, ItemToken, WinkMethods } from 'wink-nlp';
import model from 'wink-eng-lite-web-model';

/**
 * Universal Dependencies part-of-speech tag ("NOUN", "VERB", "ADP", ...)
 */
export type PartOfSpeech = string;

export interface Token {
  /** Surface form as written, without surrounding punctuation */
  readonly text: string;
  /**
   * Index of the run the token belongs to. Runs end at sentence
   * boundaries and at tokens that cannot be spoken as syllables
   * (numbers, URLs, emoji). Indices increase but need not be contiguous.
   */
  readonly sentence: number;
  readonly pos?: PartOfSpeech;
}

export interface Tokenizer {
  tokenize(text: string): Token[];
}

// Token types that have no syllable count of their own and split runs
const BREAKING_TYPES = new Set([
  'number',
  'ordinal',
  'currency',
  'time',
  'url',
  'email',
  'mention',
  'hashtag',
  'emoji',
  'emoticon',
]);

const LETTER = /\p{L}/u;

let nlp: WinkMethods | null = null;

/**
 * Load the English model once per process
 */
function getNlp(): WinkMethods {
  if (!nlp) {
    nlp = winkNLP(model);
  }
  return nlp;
}

/**
 * Tokenizer backed by wink-nlp: sentence boundaries, tokens and POS tags.
 * Punctuation is dropped. Contractions that wink splits ("do" + "n't")
 * are glued back together when the source has no space between them.
 */
export class WinkTokenizer implements Tokenizer {
  tokenize(text: string): Token[] {
    const wink = getNlp();
    const its = wink.its;
    const doc = wink.readDoc(text);
    const tokens: Token[] = [];
    let run = 0;

    doc.sentences().each((sentence: ItemSentence) => {
      let previousWasWord = false;

      sentence.tokens().each((item: ItemToken) => {
        const type = item.out(its.type);
        const value = item.out(its.value);

        if (BREAKING_TYPES.has(type)) {
          run++;
          previousWasWord = false;
          return;
        }

        if (!LETTER.test(value)) {
          previousWasWord = false;
          return;
        }

        const last = tokens[tokens.length - 1];
        if (previousWasWord && last !== undefined && item.out(its.precedingSpaces) === '') {
          tokens[tokens.length - 1] = { ...last, text: last.text + value };
        } else {
          tokens.push({ text: value, sentence: run, pos: item.out(its.pos) });
        }
        previousWasWord = true;
      });

      run++;
    });

    return tokens;
  }
}

const SENTENCE_END = /[.!?]+["'”’)\]]*$/;
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu;

/**
 * Dependency-free tokenizer: words are whitespace-separated chunks with
 * surrounding punctuation stripped; a chunk ending in . ! or ? closes the
 * sentence. No part-of-speech tags.
 */
export class WhitespaceTokenizer implements Tokenizer {
  tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    let run = 0;

    for (const chunk of text.split(/\s+/)) {
      if (chunk.length === 0) continue;

      const core = chunk.replace(EDGE_PUNCTUATION, '');
      if (LETTER.test(core)) {
        tokens.push({ text: core, sentence: run });
      } else if (core.length > 0) {
        // Digits and the like split the run
        run++;
      }

      if (SENTENCE_END.test(chunk)) {
        run++;
      }
    }

    return tokens;
  }
}

let defaultTokenizer: WinkTokenizer | null = null;

export function getDefaultTokenizer(): Tokenizer {
  if (!defaultTokenizer) {
    defaultTokenizer = new WinkTokenizer();
  }
  return defaultTokenizer;
}
