const NON_WORD = /[^\p{L}\p{N}_]+/u;

/**
 * Lower-cases and splits on anything that is not a letter, digit or underscore.
 * Empty tokens are removed; order and duplicates are kept.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(NON_WORD)
    .filter((token) => token.length > 0);
}
