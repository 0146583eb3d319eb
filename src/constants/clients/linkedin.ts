/**
 * LinkedIn guest API constants
 *
 * Endpoints, paging and markup patterns for the public (logged-out)
 * job search interface.
 */

import type { ElementSelector, ExperienceLevel } from "@/types";

/**
 * Search endpoint; returns an HTML fragment of listing cards
 */
export const LINKEDIN_SEARCH_URL =
  "https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search";

/**
 * Detail endpoint base; the listing id is appended
 */
export const LINKEDIN_DETAIL_URL_BASE =
  "https://www.linkedin.com/jobs-guest/jobs/api/jobPosting/";

/**
 * Public listing URL base, used when the page has no canonical link
 */
export const LINKEDIN_VIEW_URL_BASE = "https://www.linkedin.com/jobs/view/";

/**
 * Cards per search page; `start` advances by this amount
 */
export const LINKEDIN_PAGE_SIZE = 25;

/**
 * f_E codes per experience level
 */
export const LINKEDIN_EXPERIENCE_LEVEL_CODES: Record<ExperienceLevel, number> = {
  internship: 1,
  entry: 2,
  associate: 3,
  mid_senior: 4,
};

/**
 * Browser-like headers; the guest API serves an empty shell to bare clients
 */
export const LINKEDIN_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 " +
    "(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Accept-Language": "en-US,en;q=0.9",
};

/**
 * data-entity-urn="urn:li:jobPosting:<id>"
 */
export const ENTITY_URN_PATTERN =
  /data-entity-urn\s*=\s*["']urn:li:jobPosting:(\d+)["']/gi;

/**
 * data-job-id="<id>" (older card markup)
 */
export const JOB_ID_ATTRIBUTE_PATTERN = /data-job-id\s*=\s*["']\s*(\d+)\s*["']/gi;

/**
 * Detail page selectors, tried in order (first non-empty wins)
 */
export const TITLE_SELECTORS: ElementSelector[] = [
  { className: "top-card-layout__title" },
  { tag: "h1", className: "topcard__title" },
  { tag: "h1" },
];

export const COMPANY_SELECTORS: ElementSelector[] = [
  { className: "topcard__org-name-link" },
  { tag: "a", within: { className: "topcard__flavor--metadata" } },
  { className: "topcard__flavor", notClassName: "topcard__flavor--bullet" },
];

export const LOCATION_SELECTORS: ElementSelector[] = [
  { className: "topcard__flavor--bullet" },
  {
    tag: "span",
    within: {
      className: "job-details-jobs-unified-top-card__primary-description-container",
    },
  },
];

export const SALARY_SELECTORS: ElementSelector[] = [
  { className: "compensation__salary" },
];

export const DESCRIPTION_SELECTORS: ElementSelector[] = [
  { className: "show-more-less-html__markup" },
  { className: "description__text" },
  { id: "job-details" },
];

/**
 * Title link selectors; the href is the canonical listing URL
 */
export const CANONICAL_LINK_SELECTORS: ElementSelector[] = [
  { tag: "a", className: "base-card__full-link" },
  { tag: "a", className: "topcard__link" },
  {
    tag: "a",
    attribute: {
      name: "data-tracking-control-name",
      value: "public_jobs_topcard-title",
    },
  },
  { tag: "a", within: { className: "top-card-layout__title" } },
];

/**
 * Links that point at a login wall rather than the posting
 */
export const AUTH_WALL_URL_FRAGMENTS = [
  "linkedin.com/login",
  "linkedin.com/uas",
  "linkedin.com/signup",
  "linkedin.com/authwall",
];
