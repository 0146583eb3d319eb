/**
 * Run configuration from environment variables
 *
 * Every knob has a default; env values override them. Invalid values throw
 * ConfigError before any network activity.
 */

import { homedir } from "os";
import { join } from "path";
import type { ExperienceLevel, RunConfig, SearchQuery } from "@/types";
import {
  DEFAULT_DETAIL_DELAY_MS,
  DEFAULT_EXPERIENCE_LEVELS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_KEYS_FILE,
  DEFAULT_MAX_SKILLS,
  DEFAULT_PAGES_PER_QUERY,
  DEFAULT_PREVIEW_LENGTH,
  DEFAULT_PROGRESS_INTERVAL,
  DEFAULT_SEARCH_PAGE_DELAY_MS,
  DEFAULT_SHEET_TITLE_PREFIX,
  DEFAULT_TOKEN_FILE,
  KEYS_FILE_ENV,
  LINKEDIN_EXPERIENCE_LEVEL_CODES,
  SKILL_VOCABULARY_PATH,
  TOKEN_FILE_ENV,
} from "@/constants";
import { loadSkillVocabulary } from "@/extraction";
import { DEFAULT_SEARCH_QUERIES, validateSearchQueries } from "@/queries";
import { ConfigError } from "./configError";

export type RunEnv = Record<string, string | undefined>;

export type BuildRunConfigOptions = {
  queries?: readonly SearchQuery[];
  /** Home directory used to expand "~" (tests) */
  homeDir?: string;
};

/**
 * Expand a leading "~" to the home directory
 */
export function expandHome(path: string, homeDir: string = homedir()): string {
  if (path === "~") {
    return homeDir;
  }
  if (path.startsWith("~/")) {
    return join(homeDir, path.slice(2));
  }
  return path;
}

function readEnv(env: RunEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Parse an integer env value within bounds
 *
 * @throws {ConfigError} Not an integer or out of range
 */
export function parseIntegerEnv(
  env: RunEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got '${raw}'`, name);
  }
  const value = Number(raw);
  if (value < min) {
    throw new ConfigError(`${name} must be >= ${min}, got ${value}`, name);
  }
  return value;
}

function isExperienceLevel(value: string): value is ExperienceLevel {
  return Object.hasOwn(LINKEDIN_EXPERIENCE_LEVEL_CODES, value);
}

/**
 * Parse a comma-separated list of experience levels
 *
 * @throws {ConfigError} Unknown level or empty list
 */
export function parseExperienceLevels(
  env: RunEnv,
  name: string,
  fallback: readonly ExperienceLevel[],
): ExperienceLevel[] {
  const raw = readEnv(env, name);
  if (raw === undefined) {
    return [...fallback];
  }

  const levels: ExperienceLevel[] = [];
  for (const part of raw.split(",")) {
    const level = part.trim().toLowerCase();
    if (!level) continue;
    if (!isExperienceLevel(level)) {
      throw new ConfigError(
        `${name} has unknown level '${level}' (expected one of: ${Object.keys(LINKEDIN_EXPERIENCE_LEVEL_CODES).join(", ")})`,
        name,
      );
    }
    if (!levels.includes(level)) {
      levels.push(level);
    }
  }

  if (levels.length === 0) {
    throw new ConfigError(`${name} must name at least one level`, name);
  }
  return levels;
}

/**
 * Build the run configuration
 *
 * @throws {ConfigError} Invalid env value, unreadable skill vocabulary or bad query list
 */
export function buildRunConfig(
  env: RunEnv,
  options: BuildRunConfigOptions = {},
): RunConfig {
  const homeDir = options.homeDir ?? homedir();
  const queries = [...(options.queries ?? DEFAULT_SEARCH_QUERIES)];

  try {
    validateSearchQueries(queries);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  const skillsPath = readEnv(env, "SKILLS_PATH") ?? SKILL_VOCABULARY_PATH;
  let vocabulary: RunConfig["vocabulary"];
  try {
    vocabulary = loadSkillVocabulary(expandHome(skillsPath, homeDir));
  } catch (error) {
    throw new ConfigError(
      `Cannot load skill vocabulary from ${skillsPath}: ${error instanceof Error ? error.message : String(error)}`,
      "SKILLS_PATH",
    );
  }

  return {
    queries,
    pagesPerQuery: parseIntegerEnv(env, "PAGES_PER_QUERY", DEFAULT_PAGES_PER_QUERY, 1),
    experienceLevels: parseExperienceLevels(
      env,
      "EXPERIENCE_LEVELS",
      DEFAULT_EXPERIENCE_LEVELS,
    ),
    vocabulary,
    maxSkills: DEFAULT_MAX_SKILLS,
    previewLength: DEFAULT_PREVIEW_LENGTH,
    progressInterval: DEFAULT_PROGRESS_INTERVAL,
    searchPageDelayMs: parseIntegerEnv(
      env,
      "SEARCH_PAGE_DELAY_MS",
      DEFAULT_SEARCH_PAGE_DELAY_MS,
      0,
    ),
    detailDelayMs: parseIntegerEnv(env, "DETAIL_DELAY_MS", DEFAULT_DETAIL_DELAY_MS, 0),
    httpTimeoutMs: parseIntegerEnv(env, "HTTP_TIMEOUT_MS", DEFAULT_HTTP_TIMEOUT_MS, 1),
    credentials: {
      keysFile: expandHome(readEnv(env, KEYS_FILE_ENV) ?? DEFAULT_KEYS_FILE, homeDir),
      tokenFile: expandHome(readEnv(env, TOKEN_FILE_ENV) ?? DEFAULT_TOKEN_FILE, homeDir),
    },
    sheetTitlePrefix: DEFAULT_SHEET_TITLE_PREFIX,
  };
}
