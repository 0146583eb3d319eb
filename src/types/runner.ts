/**
 * Runner/orchestration type definitions
 *
 * Types for a single scrape run (Init → Auth → Search → FetchDetails →
 * Extract → Write → Done).
 */

import type { CredentialPaths } from "./credentials";
import type { ExperienceLevel } from "./clients/linkedin";
import type { SkillVocabulary } from "./extraction";
import type {
  DetailFailureReason,
  ListingId,
  OutputRow,
  QuerySearchStats,
  SearchQuery,
} from "./listing";

/**
 * Everything a run needs, passed in explicitly
 */
export type RunConfig = {
  queries: SearchQuery[];
  pagesPerQuery: number;
  experienceLevels: ExperienceLevel[];
  vocabulary: SkillVocabulary;
  maxSkills: number;
  previewLength: number;
  progressInterval: number;
  searchPageDelayMs: number;
  detailDelayMs: number;
  httpTimeoutMs: number;
  credentials: CredentialPaths;
  sheetTitlePrefix: string;
};

/**
 * Pipeline step names, in order
 */
export type RunStep = "auth" | "search" | "details" | "write";

/**
 * Fixed-format progress output for the CLI
 *
 * Kept separate from the logger: the logger is for diagnostics,
 * the reporter is the user-facing run report.
 */
export interface ProgressReporter {
  /** Title framed by rules */
  banner(title: string): void;
  /** Step header, e.g. "[2/4] Searching LinkedIn for jobs..." */
  step(step: RunStep, message: string): void;
  /** Indented detail line */
  line(message: string): void;
  /** Closing block framed by rules */
  footer(lines: readonly string[]): void;
}

/**
 * Final outcome of a run
 */
export type RunSummary = {
  status: "written" | "no_listings";
  queries: QuerySearchStats[];
  uniqueIds: number;
  duplicates: number;
  fetched: number;
  failed: Array<{ id: ListingId; reason: DetailFailureReason }>;
  rows: OutputRow[];
  spreadsheetId?: string;
  spreadsheetUrl?: string;
};
