import { describe, it, expect, vi, afterEach } from "vitest";
import {
  HaikuText,
  MapSyllableOracle,
  WhitespaceTokenizer,
  constantEvaluator,
  endsInNounEvaluator,
  joiningWordLineEndingEvaluator,
  lineEndingPartOfSpeechEvaluator,
  prepositionCountEvaluator,
} from "../index.js";
import type { Haiku } from "../index.js";
import { LINCOLN_TEXT, lincolnOracle } from "./fixtures.js";

const tokenizer = new WhitespaceTokenizer();

describe("HaikuText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("with injected tokenizer and oracle", () => {
    it("should find the haiku in a text", () => {
      const text = new HaikuText(LINCOLN_TEXT, { tokenizer, oracle: lincolnOracle() });
      expect(text.hasHaiku()).toBe(true);
      expect(text.getHaikus().map(h => h.getLines())).toEqual([
        ["abraham lincoln", "was a president one time", "he freed many slaves"],
      ]);
    });

    it("should return the same haikus on every call", () => {
      const text = new HaikuText(LINCOLN_TEXT, { tokenizer, oracle: lincolnOracle() });
      const first = text.getHaikus();
      const second = text.getHaikus();
      expect(second).toBe(first);
      expect(second.map(h => h.getLines())).toEqual(first.map(h => h.getLines()));
    });

    it("should tokenize once", () => {
      const tokenize = vi.spyOn(tokenizer, "tokenize");
      const text = new HaikuText(LINCOLN_TEXT, { tokenizer, oracle: lincolnOracle() });
      text.getHaikus();
      text.syllableCount();
      text.getHaikus();
      expect(tokenize).toHaveBeenCalledTimes(1);
    });

    it("should map words to syllables", () => {
      const text = new HaikuText("The cat, the hat.", {
        tokenizer,
        oracle: new MapSyllableOracle({ the: 1, cat: 1, hat: 1 }),
      });
      expect(text.syllableMap()).toEqual([
        ["The", 1],
        ["cat", 1],
        ["the", 1],
        ["hat", 1],
      ]);
      expect(text.syllableCount()).toBe(4);
      expect(text.hasHaiku()).toBe(false);
    });

    it("should find line-end bigrams", () => {
      const oracle = new MapSyllableOracle({ onto: 2, into: 2 });
      const text = new HaikuText("Dog in the floor at, one onto the home for it, jump into the pool", {
        tokenizer,
        oracle,
      });
      const [haiku] = text.getHaikus();
      expect(haiku.lineEndBigrams()).toEqual([
        ["at", "one"],
        ["it", "jump"],
      ]);
    });

    it("should apply syllable overrides from settings", () => {
      const text = new HaikuText(LINCOLN_TEXT, {
        tokenizer,
        oracle: lincolnOracle(),
        settings: { syllableOverrides: { Many: 1 } },
      });
      expect(text.syllableCount()).toBe(16);
      expect(text.hasHaiku()).toBe(false);
    });

    it("should respect sentence boundaries unless spanning is allowed", () => {
      const split = "abraham lincoln was a president. one time he freed many slaves";
      expect(new HaikuText(split, { tokenizer, oracle: lincolnOracle() }).getHaikus()).toEqual([]);

      const spanning = new HaikuText(split, {
        tokenizer,
        oracle: lincolnOracle(),
        settings: { allowSentenceSpanning: true },
      });
      expect(spanning.getHaikus()).toHaveLength(1);
    });

    it("should rank its haikus", () => {
      const text = new HaikuText(LINCOLN_TEXT, { tokenizer, oracle: lincolnOracle() });
      const ranked = text.rankHaikus([{ evaluator: constantEvaluator(0.5), weight: 1 }]);
      expect(ranked).toHaveLength(1);
      expect(ranked[0].quality).toBe(0.5);
      expect(ranked[0].haiku).toBe(text.getHaikus()[0]);
    });

    it("should log one scan event when enabled", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const text = new HaikuText(LINCOLN_TEXT, {
        tokenizer,
        oracle: lincolnOracle(),
        settings: { logEvents: true },
      });
      text.getHaikus();
      text.getHaikus();

      expect(log).toHaveBeenCalledTimes(1);
      const payload = JSON.parse(String(log.mock.calls[0][0]));
      expect(payload).toMatchObject({ event: "haiku_scan", word_count: 11, haiku_count: 1 });
    });
  });

  describe("with the default tokenizer and dictionary", () => {
    it("should find nothing in a tiny text", () => {
      const text = new HaikuText("Hi.");
      expect(text.getHaikus()).toEqual([]);
      expect(text.syllableCount()).toBe(1);
    });

    it("should find a haiku within one sentence", () => {
      const text = new HaikuText("An old silent pond a frog jumps into the pond splash silence again");
      expect(text.getHaikus().map(h => h.getLines())).toEqual([
        ["An old silent pond", "a frog jumps into the pond", "splash silence again"],
      ]);
    });

    it("should drop punctuation from lines when spanning sentences", () => {
      const classic = "An old silent pond... A frog jumps into the pond. Splash! Silence again.";
      expect(new HaikuText(classic).getHaikus()).toEqual([]);

      const text = new HaikuText(classic, { settings: { allowSentenceSpanning: true } });
      expect(text.getHaikus().map(h => h.getLines())).toEqual([
        ["An old silent pond", "A frog jumps into the pond", "Splash Silence again"],
      ]);
    });

  });

  describe("scoring tagged haikus", () => {
    const CLASSIC = "An old silent pond... A frog jumps into the pond. Splash! Silence again.";
    const SHOW_US = "Application is the most wonderful artist that man can show us";

    function firstHaiku(text: string, allowSentenceSpanning = false): Haiku {
      const [haiku] = new HaikuText(text, { settings: { allowSentenceSpanning } }).getHaikus();
      expect(haiku).toBeDefined();
      return haiku;
    }

    it("should score lines ending in nouns, verbs and adjectives", () => {
      expect(lineEndingPartOfSpeechEvaluator.evaluate(firstHaiku(CLASSIC, true))).toBeCloseTo(2 / 3);
      expect(lineEndingPartOfSpeechEvaluator.evaluate(firstHaiku(SHOW_US))).toBeCloseTo(2 / 3);
      expect(
        lineEndingPartOfSpeechEvaluator.evaluate(
          firstHaiku("They jumped ship on us the boat is very never that man can show us")
        )
      ).toBe(0);
    });

    it("should score lines ending in joining words", () => {
      expect(joiningWordLineEndingEvaluator.evaluate(firstHaiku(CLASSIC, true))).toBe(1);
      expect(
        joiningWordLineEndingEvaluator.evaluate(
          firstHaiku("Application and the most wonderful artist that man can show us")
        )
      ).toBeCloseTo(2 / 3);
      expect(
        joiningWordLineEndingEvaluator.evaluate(
          firstHaiku("They jumped right on in the boat is never sunk and that man can show of")
        )
      ).toBe(0);
    });

    it("should score haikus that end in a noun or pronoun", () => {
      expect(endsInNounEvaluator.evaluate(firstHaiku(CLASSIC, true))).toBe(0);
      expect(endsInNounEvaluator.evaluate(firstHaiku(SHOW_US))).toBe(1);
      expect(
        endsInNounEvaluator.evaluate(firstHaiku("Application is the most wonderful artist that man can show god"))
      ).toBe(1);
    });

    it("should penalise prepositions", () => {
      const prepositions = [{ evaluator: prepositionCountEvaluator, weight: 1 }];
      const crowded = new HaikuText("Dog in the floor at, one onto the home for it, jump into the pool");
      const plain = new HaikuText("this is a new vogue, she always has a new vogue, she never repeats");

      expect(crowded.hasHaiku()).toBe(true);
      expect(crowded.getHaikus()[0].calculateQuality(prepositions)).toBe(0);
      expect(plain.hasHaiku()).toBe(true);
      expect(plain.getHaikus()[0].calculateQuality(prepositions)).toBeCloseTo(0.99);
    });
  });
});
