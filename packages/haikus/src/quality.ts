// Weighted quality scoring

import { logInvalidConfiguration, logQualityScored } from '@haiku-finder/common';
import type { ConfigurationErrorReason } from '@haiku-finder/common';
import { InvalidConfigurationError } from './errors.js';
import { DEFAULT_HAIKU_EVALUATORS } from './evaluators.js';
import type { WeightedEvaluator } from './evaluators.js';
import type { Haiku } from './haiku.js';

export interface QualityOptions {
  logEvents?: boolean;
}

export interface RankedHaiku {
  haiku: Haiku;
  quality: number;
}

function fail(reason: ConfigurationErrorReason, message: string, options: QualityOptions): never {
  if (options.logEvents) logInvalidConfiguration(reason, message);
  throw new InvalidConfigurationError(reason, message);
}

/**
 * Throw unless the list can produce a weighted mean
 */
export function validateEvaluators(
  evaluators: readonly WeightedEvaluator[],
  options: QualityOptions = {}
): void {
  if (evaluators.length === 0) {
    fail('empty_evaluators', 'At least one evaluator is required', options);
  }

  let total = 0;
  for (const { evaluator, weight } of evaluators) {
    if (!Number.isFinite(weight) || weight < 0) {
      fail('invalid_weight', `Evaluator "${evaluator.name}" has invalid weight ${weight}`, options);
    }
    total += weight;
  }

  if (total === 0) {
    fail('zero_total_weight', 'Evaluator weights sum to zero', options);
  }
  if (!Number.isFinite(total)) {
    fail('invalid_weight', 'Evaluator weights sum past the largest finite number', options);
  }
}

/**
 * Weighted mean of evaluator scores: sum(score * weight) / sum(weight)
 */
export function calculateQuality(
  haiku: Haiku,
  evaluators: readonly WeightedEvaluator[] = DEFAULT_HAIKU_EVALUATORS,
  options: QualityOptions = {}
): number {
  validateEvaluators(evaluators, options);

  let weighted = 0;
  let totalWeight = 0;
  for (const { evaluator, weight } of evaluators) {
    weighted += evaluator.evaluate(haiku) * weight;
    totalWeight += weight;
  }
  const score = weighted / totalWeight;

  if (options.logEvents) {
    logQualityScored(haiku.start, score, evaluators.length);
  }

  return score;
}

/**
 * Score every haiku and sort best first; equal scores keep text order
 */
export function rankHaikus(
  haikus: readonly Haiku[],
  evaluators: readonly WeightedEvaluator[] = DEFAULT_HAIKU_EVALUATORS,
  options: QualityOptions = {}
): RankedHaiku[] {
  return haikus
    .map(haiku => ({ haiku, quality: calculateQuality(haiku, evaluators, options) }))
    .sort((a, b) => b.quality - a.quality || a.haiku.start - b.haiku.start);
}
