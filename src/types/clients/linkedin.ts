/**
 * LinkedIn guest API type definitions
 *
 * These types represent the data shapes used by the LinkedIn guest client.
 * Parsed detail fields are provider-level; the pipeline maps them to
 * ListingDetail.
 */

/**
 * Experience-level filter (f_E parameter)
 */
export type ExperienceLevel = "internship" | "entry" | "associate" | "mid_senior";

/**
 * One search page request
 */
export type SearchPageRequest = {
  keyword: string;
  location: string;
  /** 0-based page number; converted to a `start` offset */
  page: number;
  experienceLevels: ExperienceLevel[];
};

/**
 * Which markup pattern produced the ids of a search page
 * - entity_urn: data-entity-urn="urn:li:jobPosting:<id>"
 * - job_id: data-job-id="<id>" (older card markup)
 * - none: markup matched neither pattern
 */
export type SearchPageMarkup = "entity_urn" | "job_id" | "none";

/**
 * Ids extracted from one search page, in page order
 */
export type SearchPageResult = {
  ids: string[];
  markup: SearchPageMarkup;
};

/**
 * Fields parsed from a detail page (empty string when absent)
 */
export type ParsedListingPage = {
  title: string;
  company: string;
  location: string;
  salary: string;
  description: string;
  /** Canonical listing URL from the title link, if any */
  canonicalUrl: string | null;
};

/**
 * Element selector understood by the regex-based HTML extractor
 *
 * Every given property must match on the opening tag.
 */
export type ElementSelector = {
  tag?: string;
  id?: string;
  className?: string;
  /** Reject elements that carry this class */
  notClassName?: string;
  attribute?: { name: string; value: string };
  /** Only match inside the first element matching this selector */
  within?: ElementSelector;
};
