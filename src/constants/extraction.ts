/**
 * Field extraction constants
 */

/**
 * Path to the skill vocabulary JSON file (relative to project root)
 */
export const SKILL_VOCABULARY_PATH = "data/skills.json";

/**
 * Maximum number of skills kept per listing
 */
export const DEFAULT_MAX_SKILLS = 10;

/**
 * Experience patterns, tried in order; capture group 1 is returned
 *
 * 1. Ranges: "1-2 years", "3 to 5 years", "2–4 years"
 * 2. Single amounts: "2+ years", "3 years of experience"
 * 3. Entry-level wording: "fresher", "entry level", "0 to 2 years"
 */
export const EXPERIENCE_PATTERNS: RegExp[] = [
  /\b(\d[\d\-–+]*\s*(?:to|-|–)\s*\d+\s*years?)\b/i,
  /\b(\d+\+?\s*years?\s*(?:of\s+)?(?:experience|exp)?)\b/i,
  /\b(fresher|entry[\s-]?level|0[\s-]?to[\s-]?\d+\s*years?)\b/i,
];
