/**
 * Listing domain types
 *
 * Pipeline data model: SearchQuery → ListingId → ListingDetail →
 * DerivedFields → OutputRow.
 */

/**
 * Keyword + location pair, enumerated at start
 */
export type SearchQuery = {
  readonly keyword: string;
  readonly location: string;
};

/**
 * Opaque posting identifier (dedupe key)
 */
export type ListingId = string;

/**
 * Parsed detail of a single listing
 */
export type ListingDetail = {
  readonly id: ListingId;
  readonly company: string;
  readonly title: string;
  readonly location: string;
  readonly salary?: string;
  /** Normalized plain text (markup stripped, whitespace collapsed) */
  readonly description: string;
  /** Canonical URL of the posting */
  readonly applyUrl: string;
  readonly scrapedAt: Date;
};

/**
 * Fields derived from the description text
 */
export type DerivedFields = {
  readonly experience?: string;
  /** Vocabulary order, no duplicates */
  readonly skills: readonly string[];
};

/**
 * One output row: detail joined with its derived fields
 */
export type OutputRow = ListingDetail & DerivedFields;

/**
 * Why a detail fetch was skipped
 * - http: non-2xx status
 * - network: request failed without a response (timeout, DNS, reset)
 * - missing_fields: page parsed but company or title not found
 */
export type DetailFailureReason = "http" | "network" | "missing_fields";

/**
 * Per-listing fetch outcome
 */
export type ListingFetchResult =
  | { ok: true; detail: ListingDetail }
  | { ok: false; id: ListingId; reason: DetailFailureReason; message: string };

/**
 * Counts reported for one search query
 */
export type QuerySearchStats = {
  query: SearchQuery;
  pagesRequested: number;
  pagesFailed: number;
  /** Ids seen on this query's pages, duplicates included */
  found: number;
  /** Ids never seen before in this run */
  new: number;
  duplicates: number;
};

/**
 * Result of the listing search step
 */
export type ListingSearchResult = {
  /** Unique ids in first-seen order */
  ids: ListingId[];
  perQuery: QuerySearchStats[];
  totals: {
    pagesRequested: number;
    pagesFailed: number;
    found: number;
    duplicates: number;
  };
};

/**
 * Result of the detail fetch step
 */
export type DetailFetchSummary = {
  details: ListingDetail[];
  failures: Array<Extract<ListingFetchResult, { ok: false }>>;
};
