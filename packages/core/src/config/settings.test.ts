import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigurationError } from "@solace/shared";
import {
  CLASSIFIER_CONFIG,
  SYNTHESIS_CONFIG,
  getClassifierSettings,
  getSynthesisSettings,
} from "./settings.js";

const KEYS = [
  "SYNTHESIS_STRONG_NEGATIVE_THRESHOLD",
  "CLASSIFIER_TIMEOUT_MS",
  "CLASSIFIER_FAILURE_THRESHOLD",
  "CLASSIFIER_RESET_TIMEOUT_MS",
] as const;

const originalEnv = process.env;

beforeEach(() => {
  process.env = { ...originalEnv };
  for (const key of KEYS) delete process.env[key];
});

afterEach(() => {
  process.env = originalEnv;
});

describe("getSynthesisSettings", () => {
  it("uses the 0.7 strong-negative threshold by default", () => {
    expect(getSynthesisSettings()).toEqual({ strongNegativeThreshold: 0.7 });
    expect(SYNTHESIS_CONFIG.strongNegativeThreshold).toBe(0.7);
  });

  it("reads an override from the environment", () => {
    process.env.SYNTHESIS_STRONG_NEGATIVE_THRESHOLD = "0.8";
    expect(getSynthesisSettings().strongNegativeThreshold).toBe(0.8);
  });

  it("rejects a threshold outside [0, 1]", () => {
    process.env.SYNTHESIS_STRONG_NEGATIVE_THRESHOLD = "7";
    expect(() => getSynthesisSettings()).toThrow(ConfigurationError);
  });
});

describe("getClassifierSettings", () => {
  it("returns the defaults", () => {
    expect(getClassifierSettings()).toEqual({
      timeoutMs: CLASSIFIER_CONFIG.timeoutMs,
      failureThreshold: CLASSIFIER_CONFIG.failureThreshold,
      resetTimeoutMs: CLASSIFIER_CONFIG.resetTimeoutMs,
    });
  });

  it("reads overrides from the environment", () => {
    process.env.CLASSIFIER_TIMEOUT_MS = "2500";
    process.env.CLASSIFIER_FAILURE_THRESHOLD = "5";
    process.env.CLASSIFIER_RESET_TIMEOUT_MS = "0";

    expect(getClassifierSettings()).toEqual({
      timeoutMs: 2500,
      failureThreshold: 5,
      resetTimeoutMs: 0,
    });
  });

  it("rejects a zero timeout", () => {
    process.env.CLASSIFIER_TIMEOUT_MS = "0";
    expect(() => getClassifierSettings()).toThrow(
      'Invalid integer value for CLASSIFIER_TIMEOUT_MS: "0". Expected a whole number of at least 1.',
    );
  });
});
