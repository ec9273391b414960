import type { ConfigurationErrorReason } from '@haiku-finder/common';

/**
 * Raised when quality scoring or settings receive input that has no
 * meaningful result: an empty evaluator list, weights that sum to zero,
 * negative weights, or malformed syllable overrides.
 */
export class InvalidConfigurationError extends Error {
  readonly reason: ConfigurationErrorReason;

  constructor(reason: ConfigurationErrorReason, message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
    this.reason = reason;
  }
}
