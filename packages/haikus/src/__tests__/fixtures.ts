// Hand-built words and haikus for tests that don't need a tokenizer
import { Haiku } from "../haiku.js";
import type { HaikuLines, Word } from "../haiku.js";
import { MapSyllableOracle } from "../syllables.js";

/** [text, syllables, pos?] */
export type WordSpec = [string, number, string?];

export function makeWords(specs: WordSpec[], startIndex = 0, sentence = 0): Word[] {
  return specs.map(([text, syllables, pos], i) => ({
    text,
    syllables,
    pos,
    sentence,
    index: startIndex + i,
  }));
}

export function makeLines(first: WordSpec[], second: WordSpec[], third: WordSpec[]): HaikuLines {
  return [
    makeWords(first, 0),
    makeWords(second, first.length),
    makeWords(third, first.length + second.length),
  ];
}

export function makeHaiku(first: WordSpec[], second: WordSpec[], third: WordSpec[]): Haiku {
  return new Haiku(makeLines(first, second, third));
}

// "An old silent pond / a frog jumps into the pond / splash silence again"
export const pondHaiku = (): Haiku =>
  makeHaiku(
    [["an", 1, "DET"], ["old", 1, "ADJ"], ["silent", 2, "ADJ"], ["pond", 1, "NOUN"]],
    [["a", 1, "DET"], ["frog", 1, "NOUN"], ["jumps", 1, "VERB"], ["into", 2, "ADP"], ["the", 1, "DET"], ["pond", 1, "NOUN"]],
    [["splash", 1, "NOUN"], ["silence", 2, "NOUN"], ["again", 2, "ADV"]]
  );

// "dog in the floor at / one onto the home for it / jump into the pool"
export const prepositionHaiku = (): Haiku =>
  makeHaiku(
    [["dog", 1, "NOUN"], ["in", 1, "ADP"], ["the", 1, "DET"], ["floor", 1, "NOUN"], ["at", 1, "ADP"]],
    [["one", 1, "NUM"], ["onto", 2, "ADP"], ["the", 1, "DET"], ["home", 1, "NOUN"], ["for", 1, "ADP"], ["it", 1, "PRON"]],
    [["jump", 1, "VERB"], ["into", 2, "ADP"], ["the", 1, "DET"], ["pool", 1, "NOUN"]]
  );

export const LINCOLN_TEXT = "abraham lincoln was a president one time he freed many slaves";

export const lincolnOracle = (): MapSyllableOracle =>
  new MapSyllableOracle({
    abraham: 3,
    lincoln: 2,
    was: 1,
    a: 1,
    president: 3,
    one: 1,
    time: 1,
    he: 1,
    freed: 1,
    many: 2,
    slaves: 1,
  });
