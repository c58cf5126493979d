/**
 * Text normalizer — canonical form used for every comparison
 * in the rules engine.
 */

const NON_ALPHANUMERIC = /[^a-z0-9\s]+/g;
const WHITESPACE = /\s+/g;

/**
 * Lowercase, turn punctuation into spaces, collapse whitespace, trim.
 * normalize(normalize(x)) === normalize(x).
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(NON_ALPHANUMERIC, ' ')
    .replace(WHITESPACE, ' ')
    .trim();
}
