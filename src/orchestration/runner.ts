/**
 * Scrape runner: Auth → Search → FetchDetails/Extract → Write
 *
 * Sequential, single pass. Per-page and per-listing failures are counted
 * and reported; AuthError and WriteError end the run.
 */

import type {
  AccessTokenProvider,
  HttpRequestFn,
  OutputRow,
  ProgressReporter,
  RunConfig,
  RunSummary,
  WriteJobsSheetResult,
} from "@/types";
import type { ListingSourceClient } from "@/interfaces";
import { LinkedInGuestClient } from "@/clients/linkedin";
import { GoogleSheetsClient } from "@/clients/googleSheets";
import { loadCredentials } from "@/auth";
import { toOutputRow } from "@/extraction";
import { fetchListingDetails, searchListings } from "@/ingestion";
import { buildSheetTitle, isWriteError, writeJobsSheet } from "@/sheets";
import type { SleepFn } from "@/utils/async/sleep";
import * as logger from "@/logger";

export type RunDeps = {
  reporter: ProgressReporter;
  /** Transport shared by the listing source, OAuth refresh and Sheets calls */
  httpRequest?: HttpRequestFn;
  /** Listing source override; defaults to the LinkedIn guest client */
  source?: ListingSourceClient;
  /** Credential loader override */
  authenticate?: (config: RunConfig) => Promise<AccessTokenProvider>;
  sleep?: SleepFn;
  now?: () => Date;
};

/**
 * Print the rows that could not be written, so nothing is lost silently
 */
export function reportUnwrittenRows(
  reporter: ProgressReporter,
  rows: readonly OutputRow[],
): void {
  reporter.line(`Write failed. ${rows.length} computed row(s) were not saved:`);
  for (const row of rows) {
    reporter.line(`- ${row.company} | ${row.title} | ${row.applyUrl}`);
  }
}

/**
 * Execute one scrape run
 *
 * @throws {AuthError} Credentials missing, malformed or rejected
 * @throws {WriteError} Spreadsheet could not be created or filled
 */
export async function runScrape(
  config: RunConfig,
  deps: RunDeps,
): Promise<RunSummary> {
  const { reporter } = deps;
  const now = deps.now ?? (() => new Date());

  reporter.banner("Job Scraper → Google Sheets");

  // 1. Auth
  reporter.step("auth", "Loading Google OAuth credentials...");
  const auth = deps.authenticate
    ? await deps.authenticate(config)
    : await loadCredentials(config.credentials, {
        httpRequest: deps.httpRequest,
      });
  reporter.line("Credentials ready.");

  // 2. Search
  reporter.step("search", "Searching LinkedIn for jobs...");
  const source =
    deps.source ??
    new LinkedInGuestClient({
      httpRequest: deps.httpRequest,
      timeoutMs: config.httpTimeoutMs,
      now,
    });

  const search = await searchListings(source, config.queries, {
    pagesPerQuery: config.pagesPerQuery,
    experienceLevels: config.experienceLevels,
    delayMs: config.searchPageDelayMs,
    sleep: deps.sleep,
    onQueryStart: (query) =>
      reporter.line(`Searching: ${query.keyword} / ${query.location}`),
    onQueryDone: (stats) => {
      const failedNote =
        stats.pagesFailed > 0 ? `, ${stats.pagesFailed} page(s) failed` : "";
      reporter.line(
        `  Found ${stats.found} job IDs (${stats.new} new, ${stats.duplicates} duplicates${failedNote})`,
      );
    },
  });
  reporter.line(`Total unique job IDs: ${search.ids.length}`);

  // 3. Details + extraction
  reporter.step(
    "details",
    `Fetching job details for ${search.ids.length} listing(s)...`,
  );
  const fetched = await fetchListingDetails(source, search.ids, {
    delayMs: config.detailDelayMs,
    progressInterval: config.progressInterval,
    reporter,
    sleep: deps.sleep,
  });
  const rows = fetched.details.map((detail) =>
    toOutputRow(detail, config.vocabulary, config.maxSkills),
  );
  reporter.line(
    `Fetched: ${rows.length} jobs  |  Failed/skipped: ${fetched.failures.length}`,
  );

  const summary: RunSummary = {
    status: "no_listings",
    queries: search.perQuery,
    uniqueIds: search.ids.length,
    duplicates: search.totals.duplicates,
    fetched: fetched.details.length,
    failed: fetched.failures.map((f) => ({ id: f.id, reason: f.reason })),
    rows,
  };

  if (rows.length === 0) {
    reporter.line("No jobs found. LinkedIn may be rate-limiting. Try again later.");
    logger.warn("No listings fetched; nothing written");
    return summary;
  }

  // 4. Write
  reporter.step("write", `Writing ${rows.length} jobs to Google Sheets...`);
  const sheets = new GoogleSheetsClient({
    auth,
    httpRequest: deps.httpRequest,
  });

  let written: WriteJobsSheetResult;
  try {
    written = await writeJobsSheet(sheets, rows, {
      title: buildSheetTitle(config.sheetTitlePrefix, config.queries, now()),
      previewLength: config.previewLength,
    });
  } catch (error) {
    if (isWriteError(error)) {
      reportUnwrittenRows(reporter, rows);
    }
    throw error;
  }

  reporter.footer([
    `✓ Scraped ${rows.length} jobs (after deduplication)`,
    `✓ Google Sheet created: ${written.spreadsheetUrl}`,
  ]);

  return {
    ...summary,
    status: "written",
    spreadsheetId: written.spreadsheetId,
    spreadsheetUrl: written.spreadsheetUrl,
  };
}
