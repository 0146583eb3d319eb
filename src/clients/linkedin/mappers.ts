/**
 * LinkedIn mappers: parsed page → ListingDetail
 */

import type { ListingDetail, ListingId, ParsedListingPage } from "@/types";
import { LINKEDIN_VIEW_URL_BASE } from "@/constants/clients/linkedin";

/**
 * Public URL of a listing, used when the page has no canonical link
 */
export function buildListingViewUrl(id: ListingId): string {
  return `${LINKEDIN_VIEW_URL_BASE}${id}`;
}

/**
 * Map a parsed detail page to a ListingDetail
 *
 * Company and title are mandatory: a page without them is usually an
 * expired posting or a block page.
 *
 * @returns The listing, or null when a mandatory field is missing
 */
export function mapParsedPageToDetail(
  id: ListingId,
  page: ParsedListingPage,
  scrapedAt: Date,
): ListingDetail | null {
  if (!page.title || !page.company) {
    return null;
  }

  return {
    id,
    company: page.company,
    title: page.title,
    location: page.location,
    ...(page.salary ? { salary: page.salary } : {}),
    description: page.description,
    applyUrl: page.canonicalUrl ?? buildListingViewUrl(id),
    scrapedAt,
  };
}
