/**
 * ListingSourceClient interface: contract for a job listing source
 *
 * The pipeline only talks to this interface, so tests can substitute an
 * in-process fake and another source could be added later.
 */

import type {
  ListingDetail,
  ListingId,
  SearchPageRequest,
  SearchPageResult,
} from "@/types";

export interface ListingSourceClient {
  /**
   * Source identifier
   */
  readonly source: string;

  /**
   * Fetch one page of search results
   *
   * @throws {SearchPageError} When the page request fails
   */
  searchPage(req: SearchPageRequest): Promise<SearchPageResult>;

  /**
   * Fetch full details for a listing
   *
   * @throws {DetailFetchError} When the page cannot be fetched or parsed
   */
  getListingDetail(id: ListingId): Promise<ListingDetail>;
}
