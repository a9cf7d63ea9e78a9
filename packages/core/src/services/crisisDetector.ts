import type { CrisisLexicon } from "../prompts/crisisLexicon.js";
import { foldForMatching } from "../utils/normalizeText.js";

/**
 * True when any lexicon phrase occurs anywhere in `text`, ignoring case.
 * Substring matching, not tokenized: false positives are preferred over
 * missed crisis language. Blank text never matches.
 */
export function detectCrisis(text: string, lexicon: CrisisLexicon): boolean {
  return findCrisisPhrase(text, lexicon) !== null;
}

/**
 * The first lexicon phrase found in `text`, or `null`. Useful for audit logs
 * that must record why a message was flagged without storing the message.
 */
export function findCrisisPhrase(
  text: string,
  lexicon: CrisisLexicon,
): string | null {
  if (typeof text !== "string" || !text.trim()) return null;
  const folded = foldForMatching(text);
  return lexicon.phrases.find((phrase) => folded.includes(phrase)) ?? null;
}
