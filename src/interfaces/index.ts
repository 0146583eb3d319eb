export type { ListingSourceClient } from "./clients/listingSourceClient";
