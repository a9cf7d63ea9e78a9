import { ValidationError } from "@solace/shared";
import type { NonEmptyList } from "../types/index.js";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const encoder = new TextEncoder();

/**
 * 32-bit FNV-1a over the UTF-8 bytes of `text`, as an unsigned integer.
 * Unseeded: the same string hashes to the same value in every process.
 */
export function stableHash(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of encoder.encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Index in `[0, length)` derived from `text` alone.
 */
export function selectIndex(text: string, length: number): number {
  if (!Number.isInteger(length) || length < 1) {
    throw new ValidationError(
      `Cannot select from ${length} candidates; need a positive integer`,
      { code: "EMPTY_CANDIDATES", context: { length } },
    );
  }
  return stableHash(text) % length;
}

/** Picks `candidates[stableHash(text) % candidates.length]`. */
export function selectDeterministic<T>(
  text: string,
  candidates: NonEmptyList<T>,
): T {
  return candidates[selectIndex(text, candidates.length)] ?? candidates[0];
}
