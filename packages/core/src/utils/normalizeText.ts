/** Typographic apostrophes and primes that users type in place of `'`. */
const TYPO_APOSTROPHE = /[‘’‚‛′]/g;

/**
 * Folds text for phrase matching: lower-case, typographic apostrophes → `'`.
 * Whitespace and punctuation are left alone so substring matches stay literal.
 */
export function foldForMatching(input: string): string {
  return input.toLowerCase().replace(TYPO_APOSTROPHE, "'");
}
