/**
 * LinkedIn guest page parsers
 *
 * Pure functions over the HTML returned by the guest endpoints.
 */

import type { ParsedListingPage, SearchPageResult } from "@/types";
import {
  AUTH_WALL_URL_FRAGMENTS,
  CANONICAL_LINK_SELECTORS,
  COMPANY_SELECTORS,
  DESCRIPTION_SELECTORS,
  ENTITY_URN_PATTERN,
  JOB_ID_ATTRIBUTE_PATTERN,
  LOCATION_SELECTORS,
  SALARY_SELECTORS,
  TITLE_SELECTORS,
} from "@/constants/clients/linkedin";
import { selectAttribute, selectText } from "@/utils/html/elementExtraction";

function collectIds(html: string, pattern: RegExp): string[] {
  const ids: string[] = [];
  for (const match of html.matchAll(pattern)) {
    const id = match[1].trim();
    if (id) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Extract listing ids from a search results fragment
 *
 * Cards carry data-entity-urn="urn:li:jobPosting:<id>"; older markup
 * uses data-job-id="<id>". Ids are returned in page order and may repeat
 * (dedupe is the caller's job).
 */
export function parseSearchPage(html: string): SearchPageResult {
  const urnIds = collectIds(html, ENTITY_URN_PATTERN);
  if (urnIds.length > 0) {
    return { ids: urnIds, markup: "entity_urn" };
  }

  const jobIds = collectIds(html, JOB_ID_ATTRIBUTE_PATTERN);
  if (jobIds.length > 0) {
    return { ids: jobIds, markup: "job_id" };
  }

  return { ids: [], markup: "none" };
}

/**
 * Clean a candidate canonical link
 *
 * Drops the query string/fragment; rejects login-wall and non-http links.
 */
export function cleanCanonicalUrl(href: string | null): string | null {
  if (!href) {
    return null;
  }
  const withoutQuery = href.split(/[?#]/)[0].trim();
  if (!/^https?:\/\//i.test(withoutQuery)) {
    return null;
  }
  if (AUTH_WALL_URL_FRAGMENTS.some((fragment) => withoutQuery.includes(fragment))) {
    return null;
  }
  return withoutQuery;
}

/**
 * Parse a listing detail page into raw fields
 *
 * Missing fields come back as "" (canonicalUrl as null); deciding which
 * fields are mandatory is left to the mapper.
 */
export function parseListingPage(html: string): ParsedListingPage {
  return {
    title: selectText(html, TITLE_SELECTORS),
    company: selectText(html, COMPANY_SELECTORS),
    location: selectText(html, LOCATION_SELECTORS),
    salary: selectText(html, SALARY_SELECTORS),
    description: selectText(html, DESCRIPTION_SELECTORS),
    canonicalUrl: cleanCanonicalUrl(
      selectAttribute(html, CANONICAL_LINK_SELECTORS, "href"),
    ),
  };
}
