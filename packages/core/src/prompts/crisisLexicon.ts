import { z } from "zod";
import { ValidationError } from "@solace/shared";
import { foldForMatching } from "../utils/normalizeText.js";

/**
 * Phrases that flag possible self-harm or suicide ideation. Matched as
 * case-insensitive substrings, so partial phrasings are covered on purpose.
 */
export const DEFAULT_CRISIS_PHRASES = [
  "suicide",
  "kill myself",
  "end my life",
  "can't go on",
  "cant go on",
  "self harm",
  "self-harm",
  "hurt myself",
  "harm myself",
  "ending it",
  "no reason to live",
] as const;

export interface CrisisLexicon {
  readonly phrases: readonly string[];
}

const phraseListSchema = z.array(z.string());

/**
 * Builds the immutable phrase list the crisis detector scans for.
 * Phrases are folded the same way input text is, blanks are dropped and
 * duplicates collapsed. An empty result is rejected: a lexicon that can
 * never match would silently disable crisis handling.
 */
export function createCrisisLexicon(
  phrases: readonly string[] = DEFAULT_CRISIS_PHRASES,
): CrisisLexicon {
  const parsed = phraseListSchema.safeParse(phrases);
  if (!parsed.success) {
    throw new ValidationError("Crisis lexicon must be a list of strings", {
      code: "INVALID_CRISIS_LEXICON",
      cause: parsed.error,
    });
  }

  const folded = new Set<string>();
  for (const phrase of parsed.data) {
    const normalized = foldForMatching(phrase.trim());
    if (normalized) folded.add(normalized);
  }

  if (folded.size === 0) {
    throw new ValidationError("Crisis lexicon must contain at least one phrase", {
      code: "INVALID_CRISIS_LEXICON",
    });
  }

  return Object.freeze({ phrases: Object.freeze([...folded]) });
}

/**
 * Returns a new lexicon with `extra` phrases appended to `base`.
 */
export function extendCrisisLexicon(
  base: CrisisLexicon,
  extra: readonly string[],
): CrisisLexicon {
  return createCrisisLexicon([...base.phrases, ...extra]);
}
