/**
 * Field extraction public API
 */

export { extractExperience } from "./experience";
export { extractSkills } from "./skillMatcher";
export { deriveFields, toOutputRow } from "./deriveFields";
export {
  loadSkillVocabulary,
  compileSkillVocabulary,
  validateSkillVocabularyRaw,
  SkillVocabularyError,
} from "./skillVocabulary";
