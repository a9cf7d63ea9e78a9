import { z } from "zod";
import { ConfigurationError } from "./errors.js";

/**
 * Retrieves an optional environment variable with an optional default value.
 * Returns `undefined` if the variable is not set (or empty) and no default
 * is provided.
 */
export function getOptionalEnv(
  key: string,
  defaultValue?: string,
): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value;
}

export interface NumericBounds {
  min?: number;
  max?: number;
}

function describeBounds({ min, max }: NumericBounds): string {
  if (min !== undefined && max !== undefined) return ` between ${min} and ${max}`;
  if (min !== undefined) return ` of at least ${min}`;
  if (max !== undefined) return ` of at most ${max}`;
  return "";
}

function boundedNumber(schema: z.ZodNumber, bounds: NumericBounds) {
  let bounded = schema;
  if (bounds.min !== undefined) bounded = bounded.min(bounds.min);
  if (bounds.max !== undefined) bounded = bounded.max(bounds.max);
  return bounded;
}

/**
 * Parses an environment variable as an integer using Zod.
 * Throws `ConfigurationError` if set but not a whole number inside `bounds`.
 * Returns `defaultValue` if the variable is unset or empty.
 */
export function parseEnvInt(
  key: string,
  defaultValue: number,
  bounds: NumericBounds = {},
): number {
  const raw = getOptionalEnv(key);
  if (raw === undefined) return defaultValue;
  const result = boundedNumber(z.coerce.number().int(), bounds).safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid integer value for ${key}: "${raw}". Expected a whole number${describeBounds(bounds)}.`,
      { context: { key } },
    );
  }
  return result.data;
}

/**
 * Parses an environment variable as a float using Zod.
 * Throws `ConfigurationError` if set but not a number inside `bounds`.
 * Returns `defaultValue` if the variable is unset or empty.
 */
export function parseEnvFloat(
  key: string,
  defaultValue: number,
  bounds: NumericBounds = {},
): number {
  const raw = getOptionalEnv(key);
  if (raw === undefined) return defaultValue;
  const result = boundedNumber(z.coerce.number().finite(), bounds).safeParse(
    raw,
  );
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${raw}". Expected a number${describeBounds(bounds)}.`,
      { context: { key } },
    );
  }
  return result.data;
}
