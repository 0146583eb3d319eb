/**
 * Header formatting requests for the Jobs tab
 *
 * Bold coloured header, frozen first row, auto-sized columns.
 */

import {
  HEADER_BACKGROUND_COLOR,
  HEADER_FOREGROUND_COLOR,
  JOB_SHEET_COLUMNS,
} from "@/constants";

export function buildHeaderFormatRequests(sheetId: number): unknown[] {
  const columnCount = JOB_SHEET_COLUMNS.length;

  return [
    {
      repeatCell: {
        range: {
          sheetId,
          startRowIndex: 0,
          endRowIndex: 1,
          startColumnIndex: 0,
          endColumnIndex: columnCount,
        },
        cell: {
          userEnteredFormat: {
            backgroundColor: HEADER_BACKGROUND_COLOR,
            textFormat: {
              bold: true,
              foregroundColor: HEADER_FOREGROUND_COLOR,
            },
          },
        },
        fields: "userEnteredFormat(backgroundColor,textFormat)",
      },
    },
    {
      updateSheetProperties: {
        properties: { sheetId, gridProperties: { frozenRowCount: 1 } },
        fields: "gridProperties.frozenRowCount",
      },
    },
    {
      autoResizeDimensions: {
        dimensions: {
          sheetId,
          dimension: "COLUMNS",
          startIndex: 0,
          endIndex: columnCount,
        },
      },
    },
  ];
}
