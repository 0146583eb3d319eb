/**
 * LinkedIn guest client public API
 */

export { LinkedInGuestClient } from "./linkedinGuestClient";
export type { LinkedInGuestClientConfig } from "./linkedinGuestClient";
export { SearchPageError, DetailFetchError } from "./linkedinErrors";
export { parseSearchPage, parseListingPage, cleanCanonicalUrl } from "./parsers";
export { mapParsedPageToDetail, buildListingViewUrl } from "./mappers";
