import { parseEnvFloat, parseEnvInt } from "@solace/shared";

export const SYNTHESIS_CONFIG = {
  /** NEGATIVE sentiment at or above this confidence gets the strong reply. */
  strongNegativeThreshold: 0.7,
} as const;

export const CLASSIFIER_CONFIG = {
  /** Maximum time (ms) a single classifier call may take. */
  timeoutMs: 10_000,
  /** Consecutive failures before the classifier circuit opens. */
  failureThreshold: 3,
  /** Time (ms) an open classifier circuit waits before probing again. */
  resetTimeoutMs: 30_000,
} as const;

export interface SynthesisSettings {
  strongNegativeThreshold: number;
}

export interface ClassifierSettings {
  timeoutMs: number;
  failureThreshold: number;
  resetTimeoutMs: number;
}

/**
 * Synthesis settings with env overrides applied.
 * `SYNTHESIS_STRONG_NEGATIVE_THRESHOLD` must lie in `[0, 1]`.
 */
export function getSynthesisSettings(): SynthesisSettings {
  return {
    strongNegativeThreshold: parseEnvFloat(
      "SYNTHESIS_STRONG_NEGATIVE_THRESHOLD",
      SYNTHESIS_CONFIG.strongNegativeThreshold,
      { min: 0, max: 1 },
    ),
  };
}

export function getClassifierSettings(): ClassifierSettings {
  return {
    timeoutMs: parseEnvInt("CLASSIFIER_TIMEOUT_MS", CLASSIFIER_CONFIG.timeoutMs, {
      min: 1,
    }),
    failureThreshold: parseEnvInt(
      "CLASSIFIER_FAILURE_THRESHOLD",
      CLASSIFIER_CONFIG.failureThreshold,
      { min: 1 },
    ),
    resetTimeoutMs: parseEnvInt(
      "CLASSIFIER_RESET_TIMEOUT_MS",
      CLASSIFIER_CONFIG.resetTimeoutMs,
      { min: 0 },
    ),
  };
}
