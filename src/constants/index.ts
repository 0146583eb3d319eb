/**
 * Constants barrel exports
 */

export * from "./logger";
export * from "./runner";
export * from "./sheets";
export * from "./extraction";
export * from "./credentials";
export * from "./textNormalization";
export * from "./clients/http";
export * from "./clients/linkedin";
export * from "./clients/googleSheets";
