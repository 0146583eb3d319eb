/**
 * Text normalization and tokenization utilities
 *
 * Provides deterministic text processing for skill vocabulary compilation
 * and description matching. The normalization is minimal and does NOT
 * include stopword removal, stemming, or lemmatization.
 */

import { TOKEN_SEPARATOR_PATTERN } from "@/constants/textNormalization";

const DIACRITIC_MARKS_PATTERN = /[\u0300-\u036f]/g;
const WHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * Removes diacritics via NFD decomposition (é → e)
 */
export function removeDiacritics(text: string): string {
  return text.normalize("NFD").replace(DIACRITIC_MARKS_PATTERN, "");
}

/**
 * Collapses every whitespace run to one space and trims the ends
 */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN_PATTERN, " ").trim();
}

/**
 * Normalizes text and splits it into tokens.
 *
 * Normalization steps (applied in order):
 * 1. Lowercase the text
 * 2. Remove diacritics (e.g., á → a)
 * 3. Split on whitespace and common separators (see TOKEN_SEPARATOR_PATTERN)
 * 4. Remove empty tokens
 *
 * @example
 * normalizeToTokens("Full-Stack Developer (C++/Node.js)")
 * // ["full", "stack", "developer", "c++", "node", "js"]
 */
export function normalizeToTokens(text: string): string[] {
  const normalized = removeDiacritics(text.toLowerCase());
  return normalized
    .split(TOKEN_SEPARATOR_PATTERN)
    .filter((token) => token.length > 0);
}
