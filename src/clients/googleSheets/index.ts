/**
 * Google Sheets client public API
 */

export { GoogleSheetsClient, GoogleSheetsError } from "./googleSheetsClient";
export type {
  GoogleSheetsConfig,
  GoogleSheetsErrorDetails,
  SheetAppendResult,
  SheetCellValue,
  SheetOperationResult,
  SheetOperationSuccess,
  SheetOperationError,
  SpreadsheetCreateResult,
  SpreadsheetBatchUpdateResult,
} from "@/types/clients/googleSheets";
