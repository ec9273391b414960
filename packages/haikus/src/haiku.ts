// Haiku entity

import type { Token } from './tokenizer.js';
import type { WeightedEvaluator } from './evaluators.js';
import { calculateQuality } from './quality.js';

/** Syllables per line */
export const HAIKU_PATTERN = [5, 7, 5] as const;

export interface Word extends Token {
  readonly syllables: number;
  /** Position in the stream of counted words */
  readonly index: number;
}

export type HaikuLine = readonly Word[];
export type HaikuLines = readonly [HaikuLine, HaikuLine, HaikuLine];

export interface HaikuOptions {
  logEvents?: boolean;
}

function sumSyllables(line: HaikuLine): number {
  return line.reduce((sum, word) => sum + word.syllables, 0);
}

/**
 * Three lines of 5, 7 and 5 syllables taken from one contiguous run of
 * words. Construction fails when the lines break either rule.
 */
export class Haiku {
  readonly lines: HaikuLines;
  private readonly logEvents: boolean;

  constructor(lines: HaikuLines, options: HaikuOptions = {}) {
    lines.forEach((line, i) => {
      const total = sumSyllables(line);
      if (total !== HAIKU_PATTERN[i]) {
        throw new Error(`Line ${i + 1} has ${total} syllables, expected ${HAIKU_PATTERN[i]}`);
      }
    });

    const words = lines.flat();
    for (let i = 1; i < words.length; i++) {
      if (words[i].index !== words[i - 1].index + 1) {
        throw new Error(`Haiku words must be contiguous (gap after index ${words[i - 1].index})`);
      }
    }

    this.lines = lines;
    this.logEvents = options.logEvents ?? false;
  }

  /** Index of the first word */
  get start(): number {
    return this.lines[0][0].index;
  }

  /** Index just past the last word */
  get end(): number {
    const last = this.lines[2];
    return last[last.length - 1].index + 1;
  }

  words(): Word[] {
    return this.lines.flat();
  }

  getLines(): [string, string, string] {
    const [first, second, third] = this.lines.map(line =>
      line.map(word => word.text).join(' ')
    );
    return [first, second, third];
  }

  syllables(): [number, number, number] {
    return [sumSyllables(this.lines[0]), sumSyllables(this.lines[1]), sumSyllables(this.lines[2])];
  }

  /**
   * Word pairs that straddle the two line breaks
   */
  lineEndBigrams(): [[string, string], [string, string]] {
    const [first, second, third] = this.lines;
    return [
      [first[first.length - 1].text, second[0].text],
      [second[second.length - 1].text, third[0].text],
    ];
  }

  /**
   * Format for display as a markdown quote
   */
  format(): string {
    const [first, second, third] = this.getLines();
    return `> *${first}*\n> *${second}*\n> *${third}*`;
  }

  calculateQuality(evaluators?: readonly WeightedEvaluator[]): number {
    return calculateQuality(this, evaluators, { logEvents: this.logEvents });
  }

  toString(): string {
    return this.getLines().join(' / ');
  }
}
