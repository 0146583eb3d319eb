/**
 * Listing search: queries × pages → unique listing ids
 *
 * Pages of each query are requested in order. A query stops early when a
 * page contributes no new id (end of results, or a failed page).
 * Ids are deduplicated across the whole run in first-seen order.
 */

import type {
  ExperienceLevel,
  ListingId,
  ListingSearchResult,
  QuerySearchStats,
  SearchQuery,
} from "@/types";
import type { ListingSourceClient } from "@/interfaces";
import { SearchPageError } from "@/clients/linkedin";
import { sleep as defaultSleep, type SleepFn } from "@/utils/async/sleep";
import * as logger from "@/logger";

export type ListingSearchOptions = {
  pagesPerQuery: number;
  experienceLevels: ExperienceLevel[];
  /** Pause between two page requests of the same query */
  delayMs: number;
  sleep?: SleepFn;
  /** Called before the first page of a query is requested */
  onQueryStart?: (query: SearchQuery) => void;
  /** Called once a query has finished, with its final stats */
  onQueryDone?: (stats: QuerySearchStats) => void;
};

/**
 * Run every query and collect unique ids
 *
 * SearchPageError is recoverable (logged, counted, query stops);
 * any other error propagates.
 */
export async function searchListings(
  client: ListingSourceClient,
  queries: readonly SearchQuery[],
  options: ListingSearchOptions,
): Promise<ListingSearchResult> {
  const sleep = options.sleep ?? defaultSleep;
  const seen = new Set<ListingId>();
  const ids: ListingId[] = [];
  const perQuery: QuerySearchStats[] = [];

  for (const query of queries) {
    const stats: QuerySearchStats = {
      query,
      pagesRequested: 0,
      pagesFailed: 0,
      found: 0,
      new: 0,
      duplicates: 0,
    };
    options.onQueryStart?.(query);
    const log = logger.withContext({
      keyword: query.keyword,
      location: query.location,
    });

    for (let page = 0; page < options.pagesPerQuery; page++) {
      if (page > 0) {
        await sleep(options.delayMs);
      }

      stats.pagesRequested++;
      let pageIds: string[];
      try {
        const result = await client.searchPage({
          keyword: query.keyword,
          location: query.location,
          page,
          experienceLevels: options.experienceLevels,
        });
        if (result.markup === "none") {
          log.warn("Search page contained no recognizable listing markup", {
            page,
          });
        }
        pageIds = result.ids;
      } catch (error) {
        if (!(error instanceof SearchPageError)) {
          throw error;
        }
        stats.pagesFailed++;
        log.warn("Search page failed, stopping query", {
          page,
          status: error.status,
          error: error.message,
        });
        break;
      }

      let newOnPage = 0;
      for (const id of pageIds) {
        stats.found++;
        if (seen.has(id)) {
          stats.duplicates++;
          continue;
        }
        seen.add(id);
        ids.push(id);
        stats.new++;
        newOnPage++;
      }

      log.debug("Search page processed", {
        page,
        found: pageIds.length,
        new: newOnPage,
      });

      if (newOnPage === 0) {
        break;
      }
    }

    perQuery.push(stats);
    options.onQueryDone?.(stats);
  }

  return {
    ids,
    perQuery,
    totals: {
      pagesRequested: sum(perQuery, (s) => s.pagesRequested),
      pagesFailed: sum(perQuery, (s) => s.pagesFailed),
      found: sum(perQuery, (s) => s.found),
      duplicates: sum(perQuery, (s) => s.duplicates),
    },
  };
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}
