/**
 * Ingestion module: search and detail fetch
 */

export { searchListings } from "./listingSearch";
export type { ListingSearchOptions } from "./listingSearch";
export { fetchListing, fetchListingDetails } from "./detailFetch";
export type { DetailFetchOptions } from "./detailFetch";
