/**
 * Experience requirement extraction
 */

import { EXPERIENCE_PATTERNS } from "@/constants/extraction";

/**
 * First experience requirement found in the text
 *
 * Patterns are tried in order (ranges, then single amounts, then
 * entry-level wording); the first pattern that matches anywhere wins.
 *
 * @example
 * extractExperience("Looking for 1-2 years experience") // "1-2 years"
 * extractExperience("5+ years of experience in Go")     // "5+ years of experience"
 * extractExperience("Great team, free lunch")           // undefined
 */
export function extractExperience(text: string): string | undefined {
  for (const pattern of EXPERIENCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return match[1].trim();
    }
  }
  return undefined;
}
