/**
 * Skill vocabulary loading and compilation
 *
 * Loads the vocabulary JSON, validates it, and compiles every entry into
 * a normalized token sequence for matching against description tokens.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  SkillRuntime,
  SkillVocabulary,
  SkillVocabularyRaw,
} from "@/types";
import { normalizeToTokens } from "@/utils/text/textNormalization";
import { SKILL_VOCABULARY_PATH } from "@/constants/extraction";

/**
 * Error thrown when the vocabulary file is invalid
 */
export class SkillVocabularyError extends Error {
  constructor(message: string) {
    super(`Skill vocabulary invalid: ${message}`);
    this.name = "SkillVocabularyError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates the raw vocabulary shape
 *
 * @throws {SkillVocabularyError} On wrong types or empty entries
 */
export function validateSkillVocabularyRaw(raw: unknown): SkillVocabularyRaw {
  if (!isRecord(raw)) {
    throw new SkillVocabularyError("root must be an object");
  }
  if (typeof raw.version !== "string" || raw.version.trim() === "") {
    throw new SkillVocabularyError("version must be a non-empty string");
  }
  if (!Array.isArray(raw.skills)) {
    throw new SkillVocabularyError("skills must be an array");
  }

  const skills: string[] = [];
  raw.skills.forEach((skill: unknown, index: number) => {
    if (typeof skill !== "string" || skill.trim() === "") {
      throw new SkillVocabularyError(
        `skills[${index}] must be a non-empty string`,
      );
    }
    skills.push(skill.trim());
  });

  return { version: raw.version, skills };
}

/**
 * Compiles a validated vocabulary into runtime form
 *
 * Entries whose token sequence repeats an earlier entry are dropped
 * (first one wins), so matching never reports the same skill twice.
 *
 * @throws {SkillVocabularyError} If an entry normalizes to zero tokens
 */
export function compileSkillVocabulary(raw: SkillVocabularyRaw): SkillVocabulary {
  const seen = new Set<string>();
  const skills: SkillRuntime[] = [];

  for (const name of raw.skills) {
    const tokens = normalizeToTokens(name);
    if (tokens.length === 0) {
      throw new SkillVocabularyError(
        `skill "${name}" normalizes to zero tokens`,
      );
    }
    const key = tokens.join("|");
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    skills.push({ name, tokens });
  }

  return { version: raw.version, skills };
}

/**
 * Loads and compiles the vocabulary file
 *
 * @param vocabularyPath - Path relative to the project root (or absolute)
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {SkillVocabularyError} If validation or compilation fails
 */
export function loadSkillVocabulary(
  vocabularyPath: string = SKILL_VOCABULARY_PATH,
): SkillVocabulary {
  const resolved = path.resolve(process.cwd(), vocabularyPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  return compileSkillVocabulary(validateSkillVocabularyRaw(raw));
}
