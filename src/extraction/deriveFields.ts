/**
 * Derived fields (pure function)
 *
 * description → { experience, skills }. Same input, same output; no I/O.
 */

import type { DerivedFields, ListingDetail, OutputRow, SkillVocabulary } from "@/types";
import { DEFAULT_MAX_SKILLS } from "@/constants/extraction";
import { extractExperience } from "./experience";
import { extractSkills } from "./skillMatcher";

export function deriveFields(
  description: string,
  vocabulary: SkillVocabulary,
  maxSkills: number = DEFAULT_MAX_SKILLS,
): DerivedFields {
  const experience = extractExperience(description);
  const skills = extractSkills(description, vocabulary, maxSkills);
  return experience === undefined ? { skills } : { experience, skills };
}

/**
 * Join a fetched listing with its derived fields
 */
export function toOutputRow(
  detail: ListingDetail,
  vocabulary: SkillVocabulary,
  maxSkills: number = DEFAULT_MAX_SKILLS,
): OutputRow {
  return { ...detail, ...deriveFields(detail.description, vocabulary, maxSkills) };
}
