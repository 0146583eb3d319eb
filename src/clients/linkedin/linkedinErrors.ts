/**
 * Per-item LinkedIn errors
 *
 * Both are recoverable: the pipeline catches them at the page/listing
 * boundary, counts them, and moves on.
 */

import type { DetailFailureReason, ListingId, SearchQuery } from "@/types";

/**
 * A search page request failed (network error, timeout, non-2xx)
 */
export class SearchPageError extends Error {
  public readonly query: SearchQuery;
  public readonly page: number;
  public readonly status?: number;

  constructor(
    query: SearchQuery,
    page: number,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "SearchPageError";
    this.query = query;
    this.page = page;
    this.status = options?.status;
  }
}

/**
 * A listing detail could not be fetched or lacked mandatory fields
 */
export class DetailFetchError extends Error {
  public readonly listingId: ListingId;
  public readonly reason: DetailFailureReason;
  public readonly status?: number;

  constructor(
    listingId: ListingId,
    reason: DetailFailureReason,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "DetailFetchError";
    this.listingId = listingId;
    this.reason = reason;
    this.status = options?.status;
  }
}
