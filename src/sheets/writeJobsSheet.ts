/**
 * Write a batch of rows to a brand-new spreadsheet
 *
 * create → single append (header + rows) → best-effort formatting.
 * Create and append failures throw WriteError; nothing is retried.
 */

import type {
  OutputRow,
  WriteJobsSheetOptions,
  WriteJobsSheetResult,
} from "@/types";
import type { SheetCellValue } from "@/types/clients/googleSheets";
import type { GoogleSheetsClient } from "@/clients/googleSheets";
import {
  JOB_SHEET_APPEND_RANGE,
  JOB_SHEET_HEADERS,
  JOB_SHEET_ID,
  JOB_SHEET_NAME,
} from "@/constants";
import * as logger from "@/logger";
import { buildHeaderFormatRequests } from "./headerFormatting";
import { mapOutputRowToSheetRow } from "./jobRowMapper";
import { WriteError } from "./writeError";

/**
 * @throws {WriteError} When the spreadsheet cannot be created or filled
 */
export async function writeJobsSheet(
  client: GoogleSheetsClient,
  rows: readonly OutputRow[],
  options: WriteJobsSheetOptions,
): Promise<WriteJobsSheetResult> {
  const created = await client.createSpreadsheet(options.title, [
    { title: JOB_SHEET_NAME, sheetId: JOB_SHEET_ID },
  ]);
  if (!created.ok) {
    throw new WriteError("create", created.error);
  }

  const { spreadsheetId, spreadsheetUrl } = created.data;
  const sheetId = created.data.sheetIds[JOB_SHEET_NAME] ?? JOB_SHEET_ID;

  const values: SheetCellValue[][] = [
    [...JOB_SHEET_HEADERS],
    ...rows.map((row) => mapOutputRowToSheetRow(row, options.previewLength)),
  ];

  const appended = await client.appendRows(
    spreadsheetId,
    JOB_SHEET_APPEND_RANGE,
    values,
  );
  if (!appended.ok) {
    throw new WriteError("append", { ...appended.error, spreadsheetId });
  }

  logger.info("Rows written to spreadsheet", {
    spreadsheetId,
    rows: rows.length,
  });

  const formattedResult = await client.batchUpdate(
    spreadsheetId,
    buildHeaderFormatRequests(sheetId),
  );
  if (!formattedResult.ok) {
    logger.warn("Header formatting failed; data is already written", {
      spreadsheetId,
      error: formattedResult.error.message,
    });
  }

  return {
    spreadsheetId,
    spreadsheetUrl,
    rowsWritten: rows.length,
    formatted: formattedResult.ok,
  };
}
