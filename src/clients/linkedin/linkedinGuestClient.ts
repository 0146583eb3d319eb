/**
 * LinkedInGuestClient: client for the public (logged-out) job pages
 *
 * Implements the ListingSourceClient interface. One request per call;
 * no retries.
 */

import type { ListingSourceClient } from "@/interfaces";
import type {
  HttpRequestFn,
  ListingDetail,
  ListingId,
  SearchPageRequest,
  SearchPageResult,
} from "@/types";
import { httpRequest as defaultHttpRequest, isHttpError } from "@/clients/http";
import {
  LINKEDIN_DETAIL_URL_BASE,
  LINKEDIN_EXPERIENCE_LEVEL_CODES,
  LINKEDIN_PAGE_SIZE,
  LINKEDIN_REQUEST_HEADERS,
  LINKEDIN_SEARCH_URL,
} from "@/constants/clients/linkedin";
import { parseListingPage, parseSearchPage } from "./parsers";
import { mapParsedPageToDetail } from "./mappers";
import { DetailFetchError, SearchPageError } from "./linkedinErrors";
import * as logger from "@/logger";

export interface LinkedInGuestClientConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  /** Request timeout override in ms */
  timeoutMs?: number;

  /** Clock used for scrapedAt (tests) */
  now?: () => Date;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * LinkedIn guest implementation of ListingSourceClient
 */
export class LinkedInGuestClient implements ListingSourceClient {
  readonly source = "linkedin";

  private readonly httpRequest: HttpRequestFn;
  private readonly timeoutMs?: number;
  private readonly now: () => Date;

  constructor(config?: LinkedInGuestClientConfig) {
    // Use injected httpRequest or default to production implementation
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
    this.timeoutMs = config?.timeoutMs;
    this.now = config?.now ?? (() => new Date());

    logger.debug("LinkedInGuestClient initialized");
  }

  /**
   * Build search query parameters for one page
   */
  private buildSearchParams(
    req: SearchPageRequest,
  ): Record<string, string | number> {
    const params: Record<string, string | number> = {
      keywords: req.keyword,
      location: req.location,
      start: req.page * LINKEDIN_PAGE_SIZE,
    };

    if (req.experienceLevels.length > 0) {
      params.f_E = req.experienceLevels
        .map((level) => LINKEDIN_EXPERIENCE_LEVEL_CODES[level])
        .join(",");
    }

    return params;
  }

  /**
   * Fetch one search results page and extract listing ids
   *
   * @throws {SearchPageError} When the request fails
   */
  async searchPage(req: SearchPageRequest): Promise<SearchPageResult> {
    const query = { keyword: req.keyword, location: req.location };

    let html: string;
    try {
      html = await this.httpRequest<string>({
        method: "GET",
        url: LINKEDIN_SEARCH_URL,
        headers: LINKEDIN_REQUEST_HEADERS,
        query: this.buildSearchParams(req),
        responseType: "text",
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new SearchPageError(
        query,
        req.page,
        `Search page ${req.page} failed for "${req.keyword}" / "${req.location}": ${describeError(error)}`,
        { status: isHttpError(error) ? error.status : undefined, cause: error },
      );
    }

    return parseSearchPage(html);
  }

  /**
   * Fetch and parse a listing detail page
   *
   * @throws {DetailFetchError} reason "http" (non-2xx), "network", or
   * "missing_fields" (company or title not found)
   */
  async getListingDetail(id: ListingId): Promise<ListingDetail> {
    let html: string;
    try {
      html = await this.httpRequest<string>({
        method: "GET",
        url: `${LINKEDIN_DETAIL_URL_BASE}${encodeURIComponent(id)}`,
        headers: LINKEDIN_REQUEST_HEADERS,
        responseType: "text",
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (isHttpError(error)) {
        throw new DetailFetchError(id, "http", `Listing ${id}: HTTP ${error.status}`, {
          status: error.status,
          cause: error,
        });
      }
      throw new DetailFetchError(
        id,
        "network",
        `Listing ${id}: ${describeError(error)}`,
        { cause: error },
      );
    }

    const detail = mapParsedPageToDetail(id, parseListingPage(html), this.now());
    if (!detail) {
      throw new DetailFetchError(
        id,
        "missing_fields",
        `Listing ${id}: company or title not found in page`,
      );
    }

    return detail;
  }
}
