// Facade: find and score the haikus in a block of text

import { resolveSettings } from './config/settings.js';
import type { HaikuSettings } from './config/settings.js';
import type { WeightedEvaluator } from './evaluators.js';
import type { Haiku, Word } from './haiku.js';
import { rankHaikus } from './quality.js';
import type { RankedHaiku } from './quality.js';
import { scanWords, toWords } from './scanner.js';
import { getDefaultSyllableOracle, withOverrides } from './syllables.js';
import type { SyllableOracle } from './syllables.js';
import { getDefaultTokenizer } from './tokenizer.js';
import type { Tokenizer } from './tokenizer.js';

export interface HaikuTextOptions {
  tokenizer?: Tokenizer;
  oracle?: SyllableOracle;
  settings?: Partial<HaikuSettings>;
}

/**
 * A piece of text and the haikus hiding in it. Tokenizing and scanning
 * happen on first use and are cached for the life of the instance.
 */
export class HaikuText {
  readonly text: string;
  readonly settings: HaikuSettings;
  private readonly tokenizer: Tokenizer;
  private readonly oracle: SyllableOracle;
  private wordCache: readonly Word[] | null = null;
  private haikuCache: readonly Haiku[] | null = null;

  constructor(text: string, options: HaikuTextOptions = {}) {
    this.text = text;
    this.settings = resolveSettings(options.settings);
    this.tokenizer = options.tokenizer ?? getDefaultTokenizer();
    this.oracle = withOverrides(
      options.oracle ?? getDefaultSyllableOracle(),
      this.settings.syllableOverrides
    );
  }

  /**
   * Words with their syllable counts, punctuation and silent tokens removed
   */
  words(): readonly Word[] {
    if (!this.wordCache) {
      this.wordCache = Object.freeze(toWords(this.tokenizer.tokenize(this.text), this.oracle));
    }
    return this.wordCache;
  }

  syllableMap(): Array<[string, number]> {
    return this.words().map((word): [string, number] => [word.text, word.syllables]);
  }

  syllableCount(): number {
    return this.words().reduce((sum, word) => sum + word.syllables, 0);
  }

  getHaikus(): readonly Haiku[] {
    if (!this.haikuCache) {
      const haikus = scanWords(this.words(), {
        allowSentenceSpanning: this.settings.allowSentenceSpanning,
        logEvents: this.settings.logEvents,
      });
      this.haikuCache = Object.freeze(haikus);
    }
    return this.haikuCache;
  }

  hasHaiku(): boolean {
    return this.getHaikus().length > 0;
  }

  /**
   * Haikus ordered best first by weighted quality
   */
  rankHaikus(evaluators?: readonly WeightedEvaluator[]): RankedHaiku[] {
    return rankHaikus(this.getHaikus(), evaluators, { logEvents: this.settings.logEvents });
  }
}
