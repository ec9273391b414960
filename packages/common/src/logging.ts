// Structured logging
// One JSON object per line on stdout, so any log collector can index the fields

export type LogEvent =
  | 'haiku_scan'
  | 'quality_scored'
  | 'invalid_configuration';

interface BaseLogPayload {
  event: LogEvent;
  timestamp?: number;
}

// =============================================================================
// Scan Events
// =============================================================================

interface HaikuScanPayload extends BaseLogPayload {
  event: 'haiku_scan';
  word_count: number;
  haiku_count: number;
  duration_ms: number;
  sentence_spanning?: boolean;
}

interface QualityScoredPayload extends BaseLogPayload {
  event: 'quality_scored';
  start: number;
  score: number;
  evaluator_count: number;
}

// =============================================================================
// Error Events
// =============================================================================

export type ConfigurationErrorReason =
  | 'empty_evaluators'
  | 'invalid_weight'
  | 'zero_total_weight'
  | 'invalid_override';

interface InvalidConfigurationPayload extends BaseLogPayload {
  event: 'invalid_configuration';
  reason: ConfigurationErrorReason;
  message?: string;
}

export type LogPayload =
  | HaikuScanPayload
  | QualityScoredPayload
  | InvalidConfigurationPayload;

/**
 * Emit a structured log event
 */
export function logEvent(payload: LogPayload): void {
  const enriched = {
    ...payload,
    timestamp: payload.timestamp || Date.now(),
  };

  console.log(JSON.stringify(enriched));
}

// =============================================================================
// Convenience Functions
// =============================================================================

export function logHaikuScan(
  wordCount: number,
  haikuCount: number,
  durationMs: number,
  options?: { sentenceSpanning?: boolean }
): void {
  logEvent({
    event: 'haiku_scan',
    word_count: wordCount,
    haiku_count: haikuCount,
    duration_ms: durationMs,
    sentence_spanning: options?.sentenceSpanning,
  });
}

export function logQualityScored(start: number, score: number, evaluatorCount: number): void {
  logEvent({
    event: 'quality_scored',
    start,
    score,
    evaluator_count: evaluatorCount,
  });
}

export function logInvalidConfiguration(
  reason: ConfigurationErrorReason,
  message?: string
): void {
  logEvent({
    event: 'invalid_configuration',
    reason,
    message: message?.slice(0, 200),
  });
}
