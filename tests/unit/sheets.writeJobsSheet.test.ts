/**
 * Unit tests for writing rows to a new spreadsheet
 */

import { describe, it, expect, beforeEach } from "vitest";
import { GoogleSheetsClient } from "@/clients/googleSheets";
import {
  WriteError,
  buildHeaderFormatRequests,
  mapOutputRowToSheetRow,
  writeJobsSheet,
} from "@/sheets";
import { JOB_SHEET_HEADERS } from "@/constants";
import { buildOutputRow } from "../helpers/fixtures";
import { createMockHttp } from "../helpers/mockHttp";

const API = "https://sheets.googleapis.com/v4";
const CREATE_URL = `${API}/spreadsheets`;
const APPEND_URL = `${API}/spreadsheets/sheet-123/values/Jobs!A1:append`;
const BATCH_URL = `${API}/spreadsheets/sheet-123:batchUpdate`;

const APPEND_OK = {
  updates: { updatedRange: "Jobs!A1:I3", updatedRows: 3, updatedColumns: 9, updatedCells: 27 },
};

describe("writeJobsSheet", () => {
  const mockHttp = createMockHttp();
  let client: GoogleSheetsClient;
  const rows = [
    buildOutputRow({ id: "1", company: "Acme Corp" }),
    buildOutputRow({ id: "2", company: "Globex Ltd" }),
  ];

  beforeEach(() => {
    mockHttp.reset();
    client = new GoogleSheetsClient({
      auth: { getAccessToken: async () => "test-access-token" },
      httpRequest: mockHttp.request,
    });
    mockHttp.on("POST", CREATE_URL, {
      spreadsheetId: "sheet-123",
      spreadsheetUrl: "https://docs.google.com/spreadsheets/d/sheet-123/edit",
      sheets: [{ properties: { sheetId: 0, title: "Jobs" } }],
    });
  });

  it("should create, append header + rows in one call, then format", async () => {
    mockHttp.on("POST", APPEND_URL, APPEND_OK);
    mockHttp.on("POST", BATCH_URL, { spreadsheetId: "sheet-123", replies: [] });

    const result = await writeJobsSheet(client, rows, {
      title: "Job Listings — Bangalore (2024-05-06)",
      previewLength: 500,
    });

    expect(result).toEqual({
      spreadsheetId: "sheet-123",
      spreadsheetUrl: "https://docs.google.com/spreadsheets/d/sheet-123/edit",
      rowsWritten: 2,
      formatted: true,
    });

    const appends = mockHttp.requestsTo("POST", APPEND_URL);
    expect(appends).toHaveLength(1);
    expect(appends[0].json).toEqual({
      values: [
        JOB_SHEET_HEADERS,
        mapOutputRowToSheetRow(rows[0], 500),
        mapOutputRowToSheetRow(rows[1], 500),
      ],
    });

    expect(mockHttp.requestsTo("POST", BATCH_URL)[0].json).toEqual({
      requests: buildHeaderFormatRequests(0),
    });
  });

  it("should not fail when formatting is rejected", async () => {
    mockHttp.on("POST", APPEND_URL, APPEND_OK);
    mockHttp.onResponse("POST", BATCH_URL, { status: 500, body: "backend error" });

    const result = await writeJobsSheet(client, rows, { title: "t", previewLength: 500 });

    expect(result.formatted).toBe(false);
    expect(result.rowsWritten).toBe(2);
  });

  it("should throw WriteError when the append is rejected, without retrying", async () => {
    mockHttp.onResponse("POST", APPEND_URL, { status: 429, body: "Quota exceeded" });

    const error = await writeJobsSheet(client, rows, { title: "t", previewLength: 500 }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({
      stage: "append",
      status: 429,
      message: "Sheet append failed (HTTP 429): Quota exceeded",
    });
    expect(mockHttp.requestsTo("POST", APPEND_URL)).toHaveLength(1);
    expect(mockHttp.requestsTo("POST", BATCH_URL)).toHaveLength(0);
  });

  it("should throw WriteError when the spreadsheet cannot be created", async () => {
    mockHttp.onResponse("POST", CREATE_URL, { status: 401, body: "unauthorized" });

    await expect(
      writeJobsSheet(client, rows, { title: "t", previewLength: 500 }),
    ).rejects.toMatchObject({ name: "WriteError", stage: "create", status: 401 });
    expect(mockHttp.requestsTo("POST", APPEND_URL)).toHaveLength(0);
  });
});

describe("buildHeaderFormatRequests", () => {
  it("should format, freeze and resize the header row of the given sheet", () => {
    expect(buildHeaderFormatRequests(7)).toEqual([
      {
        repeatCell: {
          range: {
            sheetId: 7,
            startRowIndex: 0,
            endRowIndex: 1,
            startColumnIndex: 0,
            endColumnIndex: 9,
          },
          cell: {
            userEnteredFormat: {
              backgroundColor: { red: 0.23, green: 0.47, blue: 0.85 },
              textFormat: { bold: true, foregroundColor: { red: 1, green: 1, blue: 1 } },
            },
          },
          fields: "userEnteredFormat(backgroundColor,textFormat)",
        },
      },
      {
        updateSheetProperties: {
          properties: { sheetId: 7, gridProperties: { frozenRowCount: 1 } },
          fields: "gridProperties.frozenRowCount",
        },
      },
      {
        autoResizeDimensions: {
          dimensions: { sheetId: 7, dimension: "COLUMNS", startIndex: 0, endIndex: 9 },
        },
      },
    ]);
  });
});
