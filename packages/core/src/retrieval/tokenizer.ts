/**
 * Shared tokenizer. Retrieval scoring and claim/evidence term overlap both
 * go through {@link tokenize}, so their notion of a "word" is the same.
 */

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

/** Lowercase, then take maximal runs of letters, digits and underscores. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/** Distinct tokens of a text. */
export function termSet(text: string): Set<string> {
  return new Set(tokenize(text));
}
