/**
 * Sheets module: job rows → new Google spreadsheet
 */

export { writeJobsSheet } from "./writeJobsSheet";
export {
  mapOutputRowToSheetRow,
  buildApplyLinkFormula,
  toLiteralText,
  truncateCodePoints,
  buildSheetTitle,
  formatSheetDate,
  formatSheetTimestamp,
} from "./jobRowMapper";
export { buildHeaderFormatRequests } from "./headerFormatting";
export { WriteError, isWriteError } from "./writeError";
export type { WriteStage } from "./writeError";
