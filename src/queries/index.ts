export {
  DEFAULT_SEARCH_QUERIES,
  SEARCH_KEYWORDS,
  SEARCH_LOCATIONS,
  buildSearchQueries,
  validateSearchQueries,
} from "./searchQueries";
