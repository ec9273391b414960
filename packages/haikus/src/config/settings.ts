import { logInvalidConfiguration } from '@haiku-finder/common';
import { InvalidConfigurationError } from '../errors.js';

export interface HaikuSettings {
  /** Let a haiku run across sentence boundaries (off: one sentence per haiku) */
  allowSentenceSpanning: boolean;
  /** Write structured scan/quality events to stdout */
  logEvents: boolean;
  /** Syllable counts that win over the pronouncing dictionary */
  syllableOverrides: Readonly<Record<string, number>>;
}

export const DEFAULT_SETTINGS: Readonly<HaikuSettings> = Object.freeze({
  allowSentenceSpanning: false,
  logEvents: false,
  syllableOverrides: Object.freeze({}),
});

/**
 * Merge caller overrides onto the defaults, validating syllable overrides
 */
export function resolveSettings(overrides: Partial<HaikuSettings> = {}): HaikuSettings {
  const settings: HaikuSettings = {
    allowSentenceSpanning: overrides.allowSentenceSpanning ?? DEFAULT_SETTINGS.allowSentenceSpanning,
    logEvents: overrides.logEvents ?? DEFAULT_SETTINGS.logEvents,
    syllableOverrides: {},
  };

  const normalized: Record<string, number> = {};
  for (const [word, count] of Object.entries(overrides.syllableOverrides ?? {})) {
    if (!Number.isInteger(count) || count < 0) {
      const message = `Syllable override for "${word}" must be a non-negative integer, got ${count}`;
      if (settings.logEvents) logInvalidConfiguration('invalid_override', message);
      throw new InvalidConfigurationError('invalid_override', message);
    }
    normalized[word.toLowerCase()] = count;
  }
  settings.syllableOverrides = normalized;

  return settings;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'true' || lowered === '1') return true;
  if (lowered === 'false' || lowered === '0') return false;
  return undefined;
}

/**
 * Read settings from environment variables; unset or unparseable values
 * fall back to the defaults
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): HaikuSettings {
  return resolveSettings({
    allowSentenceSpanning: parseBoolean(env.HAIKU_ALLOW_SENTENCE_SPANNING),
    logEvents: parseBoolean(env.HAIKU_LOG_EVENTS),
  });
}
