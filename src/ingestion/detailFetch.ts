/**
 * Detail fetch: unique ids → ListingDetail, one request at a time
 *
 * DetailFetchError is caught per listing and recorded as a failure;
 * the loop always continues.
 */

import type {
  DetailFetchSummary,
  ListingFetchResult,
  ListingId,
  ProgressReporter,
} from "@/types";
import type { ListingSourceClient } from "@/interfaces";
import { DetailFetchError } from "@/clients/linkedin";
import { sleep as defaultSleep, type SleepFn } from "@/utils/async/sleep";
import * as logger from "@/logger";

export type DetailFetchOptions = {
  /** Pause between two detail requests */
  delayMs: number;
  /** Report progress every N listings (0 disables) */
  progressInterval: number;
  reporter: ProgressReporter;
  sleep?: SleepFn;
};

/**
 * Fetch one listing, mapping recoverable errors to a failed result
 */
export async function fetchListing(
  client: ListingSourceClient,
  id: ListingId,
): Promise<ListingFetchResult> {
  try {
    const detail = await client.getListingDetail(id);
    return { ok: true, detail };
  } catch (error) {
    if (error instanceof DetailFetchError) {
      return { ok: false, id, reason: error.reason, message: error.message };
    }
    throw error;
  }
}

/**
 * Fetch details for every id, in order
 */
export async function fetchListingDetails(
  client: ListingSourceClient,
  ids: readonly ListingId[],
  options: DetailFetchOptions,
): Promise<DetailFetchSummary> {
  const sleep = options.sleep ?? defaultSleep;
  const summary: DetailFetchSummary = { details: [], failures: [] };

  for (const [index, id] of ids.entries()) {
    if (index > 0) {
      await sleep(options.delayMs);
    }

    const result = await fetchListing(client, id);
    if (result.ok) {
      summary.details.push(result.detail);
    } else {
      summary.failures.push(result);
      logger.warn("Listing skipped", {
        id,
        reason: result.reason,
        error: result.message,
      });
    }

    const done = index + 1;
    if (
      options.progressInterval > 0 &&
      done % options.progressInterval === 0
    ) {
      options.reporter.line(`Progress: ${done}/${ids.length} jobs fetched...`);
    }
  }

  return summary;
}
