/**
 * Text normalization constants and tunables
 *
 * These parameters control the deterministic tokenization used by
 * skill vocabulary compilation and description matching.
 */

/**
 * Regular expression pattern for splitting text into tokens.
 *
 * Splits on:
 * - Whitespace (spaces, tabs, newlines)
 * - Common technical separators: / \ | ( ) [ ] { } , ; : . ! ? " '
 * - Hyphens and underscores
 * - Unicode punctuation: curly quotes “”, apostrophes ‘’
 *
 * "+" and "#" are NOT separators so that "c++" and "c#" stay whole.
 */
export const TOKEN_SEPARATOR_PATTERN =
  /[\s\/\\|()[\]{},;:.!?"'\-_\u201c\u201d\u2018\u2019]+/;
