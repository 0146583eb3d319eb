export * from "./logger";
export * from "./credentials";
export * from "./listing";
export * from "./extraction";
export * from "./sheets";
export * from "./runner";
export * from "./clients/http";
export * from "./clients/linkedin";
// Google Sheets types are intentionally NOT exported from the global barrel.
// Import directly from "@/types/clients/googleSheets".
