import { getOptionalEnv } from "@solace/shared";

export interface FeatureFlags {
  copingTips: boolean;
}

/**
 * Reads feature flags from environment variables.
 * Flags default to `true`; only the exact string "false" disables one.
 *
 * Read once when the engine is created; later env changes do not affect an
 * engine that already exists.
 */
export function getFeatureFlags(): FeatureFlags {
  return {
    copingTips: getOptionalEnv("FEATURE_COPING_TIPS") !== "false",
  };
}
