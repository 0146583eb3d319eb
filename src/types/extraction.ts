/**
 * Field extraction type definitions
 */

/**
 * Raw skill vocabulary file (data/skills.json)
 */
export type SkillVocabularyRaw = {
  version: string;
  skills: string[];
};

/**
 * Compiled vocabulary entry
 */
export type SkillRuntime = {
  /** Display form written to the sheet (e.g. "Node.js") */
  name: string;
  /** Normalized token sequence (e.g. ["node", "js"]) */
  tokens: string[];
};

/**
 * Compiled vocabulary, in file order
 */
export type SkillVocabulary = {
  version: string;
  skills: SkillRuntime[];
};
