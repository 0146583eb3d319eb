/**
 * Runner/orchestration constants
 *
 * Defaults for a scrape run. Every value can be overridden through
 * RunConfig (see buildRunConfig).
 */

import type { ExperienceLevel } from "@/types";

/**
 * Search pages requested per query
 */
export const DEFAULT_PAGES_PER_QUERY = 3;

/**
 * Experience levels searched: entry level + associate
 */
export const DEFAULT_EXPERIENCE_LEVELS: ExperienceLevel[] = ["entry", "associate"];

/**
 * Pause between search pages (milliseconds)
 */
export const DEFAULT_SEARCH_PAGE_DELAY_MS = 800;

/**
 * Pause between detail requests (milliseconds)
 */
export const DEFAULT_DETAIL_DELAY_MS = 1500;

/**
 * Progress line every N detail fetches
 */
export const DEFAULT_PROGRESS_INTERVAL = 10;

/**
 * Spreadsheet title prefix; locations and date are appended
 */
export const DEFAULT_SHEET_TITLE_PREFIX = "Job Listings";
