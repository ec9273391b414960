// @haiku-finder/haikus - Find and score 5-7-5 haikus in text

export { HaikuText } from './haikuText.js';
export type { HaikuTextOptions } from './haikuText.js';
export { Haiku, HAIKU_PATTERN } from './haiku.js';
export type { Word, HaikuLine, HaikuLines, HaikuOptions } from './haiku.js';
export { scanHaikus, scanWords, findHaikus, toWords } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export {
  CmuSyllableOracle,
  MapSyllableOracle,
  countPhonemeSyllables,
  countTextSyllables,
  estimateSyllables,
  getDefaultSyllableOracle,
  normalizeWord,
  withOverrides,
} from './syllables.js';
export type { SyllableOracle } from './syllables.js';
export { WinkTokenizer, WhitespaceTokenizer, getDefaultTokenizer } from './tokenizer.js';
export type { Token, Tokenizer, PartOfSpeech } from './tokenizer.js';
export {
  DEFAULT_HAIKU_EVALUATORS,
  constantEvaluator,
  createEvaluator,
  endsInNounEvaluator,
  joiningWordLineEndingEvaluator,
  lineEndingPartOfSpeechEvaluator,
  prepositionCountEvaluator,
} from './evaluators.js';
export type { HaikuEvaluator, WeightedEvaluator } from './evaluators.js';
export { calculateQuality, rankHaikus, validateEvaluators } from './quality.js';
export type { QualityOptions, RankedHaiku } from './quality.js';
export { InvalidConfigurationError } from './errors.js';
export { DEFAULT_SETTINGS, resolveSettings, settingsFromEnv } from './config/settings.js';
export type { HaikuSettings } from './config/settings.js';
