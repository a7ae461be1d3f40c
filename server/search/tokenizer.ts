/**
 * Tokenizer
 *
 * Lower-cases text and keeps maximal runs of ASCII letters and digits.
 * "Winter wedding dress!" -> ["winter", "wedding", "dress"]
 */

const TOKEN_PATTERN = /[a-z0-9]+/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}
