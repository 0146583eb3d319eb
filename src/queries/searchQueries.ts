/**
 * Search query registry
 *
 * Every keyword is searched in every location, keyword-major order.
 */

import type { SearchQuery } from "@/types";

export const SEARCH_KEYWORDS = [
  "software developer",
  "AI automation engineer",
  "machine learning engineer",
] as const;

export const SEARCH_LOCATIONS = [
  "Bangalore, Karnataka",
  "Hyderabad, Telangana",
] as const;

/**
 * Cross product of keywords and locations
 */
export function buildSearchQueries(
  keywords: readonly string[],
  locations: readonly string[],
): SearchQuery[] {
  return keywords.flatMap((keyword) =>
    locations.map((location) => ({ keyword, location })),
  );
}

export const DEFAULT_SEARCH_QUERIES: readonly SearchQuery[] = buildSearchQueries(
  SEARCH_KEYWORDS,
  SEARCH_LOCATIONS,
);

/**
 * Validate a query list
 *
 * Ensures it is non-empty, fields are non-blank and pairs are unique
 * (case-insensitive).
 *
 * @throws Error if validation fails
 */
export function validateSearchQueries(queries: readonly SearchQuery[]): void {
  if (queries.length === 0) {
    throw new Error("Query list is empty - at least one query must be defined");
  }

  const seen = new Set<string>();
  for (const query of queries) {
    if (!query.keyword.trim()) {
      throw new Error(`Query for location '${query.location}' has an empty keyword`);
    }
    if (!query.location.trim()) {
      throw new Error(`Query '${query.keyword}' has an empty location`);
    }

    const key = `${query.keyword.trim().toLowerCase()}|${query.location.trim().toLowerCase()}`;
    if (seen.has(key)) {
      throw new Error(
        `Duplicate query '${query.keyword}' / '${query.location}'`,
      );
    }
    seen.add(key);
  }
}
