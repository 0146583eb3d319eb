/**
 * Google Sheets API type definitions
 *
 * These types represent the data shapes used by the Google Sheets client.
 * They are intentionally NOT exported from the global types barrel (@/types)
 * and should only be imported within src/clients/googleSheets/ and src/sheets/
 */

import type { AccessTokenProvider } from "../credentials";
import type { HttpRequestFn } from "./http";

/**
 * Google Sheets client configuration
 */
export type GoogleSheetsConfig = {
  /** Source of OAuth bearer tokens (user credentials) */
  auth: AccessTokenProvider;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;

  /** Request timeout override in ms */
  timeoutMs?: number;
};

/**
 * Cell value accepted by the values API
 */
export type SheetCellValue = string | number | boolean;

/**
 * Result of spreadsheets.create
 */
export type SpreadsheetCreateResult = {
  spreadsheetId: string;
  spreadsheetUrl: string;
  /** Numeric sheet (tab) ids by title */
  sheetIds: Record<string, number>;
};

/**
 * Result type for write/update operations
 */
export type SheetWriteResult = {
  updatedRange: string;
  updatedRows: number;
  updatedColumns: number;
  updatedCells: number;
};

/**
 * Result type for append operations
 */
export type SheetAppendResult = {
  tableRange?: string;
  updates: SheetWriteResult;
};

/**
 * Error details specific to Google Sheets API
 */
export type GoogleSheetsErrorDetails = {
  status?: number;
  message: string;
  spreadsheetId?: string;
  range?: string;
};

/**
 * Success result wrapper
 */
export type SheetOperationSuccess<T> = {
  ok: true;
  data: T;
};

/**
 * Error result wrapper
 */
export type SheetOperationError = {
  ok: false;
  error: GoogleSheetsErrorDetails;
};

/**
 * Result union for operations that may fail
 */
export type SheetOperationResult<T> =
  | SheetOperationSuccess<T>
  | SheetOperationError;

/**
 * Spreadsheet batch update response (formatting requests)
 */
export type SpreadsheetBatchUpdateResult = {
  spreadsheetId: string;
  replies: unknown[];
};

/**
 * Raw create response (only the fields we read)
 */
export type SpreadsheetCreateResponse = {
  spreadsheetId: string;
  spreadsheetUrl?: string;
  sheets?: Array<{ properties?: { sheetId?: number; title?: string } }>;
};

/**
 * Raw append response
 */
export type SheetAppendResponse = {
  tableRange?: string;
  updates: SheetWriteResult;
};
