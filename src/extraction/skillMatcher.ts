/**
 * Skill matcher
 *
 * Matches description text against the compiled skill vocabulary.
 *
 * Token boundary matching is enforced by tokenization:
 * - Each token is an atomic unit ("java" never matches "javascript")
 * - Multi-token skills match when consecutive tokens equal the sequence
 */

import type { SkillVocabulary } from "@/types";
import { normalizeToTokens } from "@/utils/text/textNormalization";
import { DEFAULT_MAX_SKILLS } from "@/constants/extraction";

/**
 * True if `sequence` occurs as consecutive tokens in `tokens`
 */
function containsSequence(tokens: string[], sequence: string[]): boolean {
  const last = tokens.length - sequence.length;
  for (let start = 0; start <= last; start++) {
    // Quick check: first token must match
    if (tokens[start] !== sequence[0]) {
      continue;
    }
    let matched = true;
    for (let offset = 1; offset < sequence.length; offset++) {
      if (tokens[start + offset] !== sequence[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return true;
    }
  }
  return false;
}

/**
 * Skills mentioned in the text, in vocabulary order
 *
 * @param text - Plain description text
 * @param vocabulary - Compiled vocabulary
 * @param maxSkills - Cap on the number of results
 * @returns Display names of matched skills (no duplicates)
 */
export function extractSkills(
  text: string,
  vocabulary: SkillVocabulary,
  maxSkills: number = DEFAULT_MAX_SKILLS,
): string[] {
  if (maxSkills <= 0) {
    return [];
  }

  const tokens = normalizeToTokens(text);
  const found: string[] = [];

  for (const skill of vocabulary.skills) {
    if (containsSequence(tokens, skill.tokens)) {
      found.push(skill.name);
      if (found.length >= maxSkills) {
        break;
      }
    }
  }

  return found;
}
