/**
 * In-process ListingSourceClient for pipeline tests
 *
 * Search pages are keyed by keyword; each entry is a list of ids or a
 * failure. Details are keyed by id; a reason string makes the fetch fail.
 */

import type {
  DetailFailureReason,
  ListingDetail,
  ListingId,
  SearchPageRequest,
  SearchPageResult,
} from "@/types";
import type { ListingSourceClient } from "@/interfaces";
import { DetailFetchError, SearchPageError } from "@/clients/linkedin";
import { buildDetail } from "./fixtures";

export type FakePage = ListingId[] | { fail: number };

export type FakeListingSource = ListingSourceClient & {
  searchCalls: SearchPageRequest[];
  detailCalls: ListingId[];
};

export function createFakeListingSource(input: {
  pages: Record<string, FakePage[]>;
  details?: Record<ListingId, ListingDetail | DetailFailureReason>;
}): FakeListingSource {
  const searchCalls: SearchPageRequest[] = [];
  const detailCalls: ListingId[] = [];

  return {
    source: "fake",
    searchCalls,
    detailCalls,

    async searchPage(req: SearchPageRequest): Promise<SearchPageResult> {
      searchCalls.push(req);
      const page = input.pages[req.keyword]?.[req.page] ?? [];
      if (!Array.isArray(page)) {
        throw new SearchPageError(
          { keyword: req.keyword, location: req.location },
          req.page,
          `HTTP ${page.fail}`,
          { status: page.fail },
        );
      }
      return { ids: page, markup: page.length > 0 ? "entity_urn" : "none" };
    },

    async getListingDetail(id: ListingId): Promise<ListingDetail> {
      detailCalls.push(id);
      const entry = input.details?.[id];
      if (typeof entry === "string") {
        throw new DetailFetchError(id, entry, `Listing ${id}: ${entry}`);
      }
      return entry ?? buildDetail({ id, company: `Company ${id}`, title: `Role ${id}` });
    },
  };
}
