/**
 * GoogleSheetsClient: API client for Google Sheets
 *
 * Provides primitive spreadsheet operations: create, append values and
 * structural batch updates. Authenticates with a user OAuth bearer token
 * from an AccessTokenProvider. Failures come back as SheetOperationError;
 * the caller decides whether they are fatal.
 */

import type { AccessTokenProvider, HttpMethod, HttpRequestFn } from "@/types";
import type {
  GoogleSheetsConfig,
  GoogleSheetsErrorDetails,
  SheetAppendResponse,
  SheetAppendResult,
  SheetCellValue,
  SheetOperationResult,
  SpreadsheetBatchUpdateResult,
  SpreadsheetCreateResponse,
  SpreadsheetCreateResult,
} from "@/types/clients/googleSheets";
import {
  GOOGLE_SHEETS_API_VERSION,
  GOOGLE_SHEETS_BASE_URL,
  GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS,
  GOOGLE_SHEETS_DOCUMENT_URL_BASE,
  GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS,
  GOOGLE_SHEETS_VALUE_INPUT_OPTION_USER_ENTERED,
} from "@/constants/clients/googleSheets";
import { httpRequest as defaultHttpRequest, isHttpError } from "@/clients/http";
import * as logger from "@/logger";

/**
 * Google Sheets API error
 */
export class GoogleSheetsError extends Error {
  constructor(
    message: string,
    public readonly details: GoogleSheetsErrorDetails,
  ) {
    super(message);
    this.name = "GoogleSheetsError";
  }
}

/**
 * Google Sheets client implementation
 */
export class GoogleSheetsClient {
  private readonly auth: AccessTokenProvider;
  private readonly httpRequest: HttpRequestFn;
  private readonly timeoutMs: number;

  constructor(config: GoogleSheetsConfig) {
    this.auth = config.auth;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.timeoutMs = config.timeoutMs ?? GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS;

    logger.debug("GoogleSheetsClient initialized");
  }

  /**
   * Make an authenticated API request
   *
   * @throws {GoogleSheetsError} On non-2xx responses or transport failures
   */
  private async apiRequest<T>(
    method: HttpMethod,
    endpoint: string,
    options: { query?: Record<string, string>; json?: unknown } = {},
  ): Promise<T> {
    const url = `${GOOGLE_SHEETS_BASE_URL}${GOOGLE_SHEETS_API_VERSION}${endpoint}`;

    try {
      const token = await this.auth.getAccessToken();
      return await this.httpRequest<T>({
        method,
        url,
        headers: { Authorization: `Bearer ${token}` },
        query: options.query,
        json: options.json,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (isHttpError(error)) {
        throw new GoogleSheetsError(
          `Google Sheets API error: ${error.status} ${error.statusText}`,
          {
            status: error.status,
            message: error.bodySnippet ?? error.message,
          },
        );
      }
      throw new GoogleSheetsError(
        `Google Sheets API request failed: ${error instanceof Error ? error.message : String(error)}`,
        { message: error instanceof Error ? error.message : String(error) },
      );
    }
  }

  /**
   * Convert a caught error into operation error details, and log it
   */
  private toErrorDetails(
    error: unknown,
    context: { spreadsheetId?: string; range?: string },
    logMessage: string,
  ): GoogleSheetsErrorDetails {
    const errorDetails: GoogleSheetsErrorDetails =
      error instanceof GoogleSheetsError
        ? { ...error.details, ...context }
        : {
            message: error instanceof Error ? error.message : String(error),
            ...context,
          };

    logger.error(logMessage, { ...context, error: errorDetails });
    return errorDetails;
  }

  /**
   * Create a new spreadsheet with the given tabs
   *
   * @param title - Spreadsheet title
   * @param sheets - Tabs to create, with fixed numeric ids
   * @returns SheetOperationResult with id, URL and tab ids
   */
  async createSpreadsheet(
    title: string,
    sheets: Array<{ title: string; sheetId: number }>,
  ): Promise<SheetOperationResult<SpreadsheetCreateResult>> {
    logger.debug("Creating Google spreadsheet", { title });

    try {
      const response = await this.apiRequest<SpreadsheetCreateResponse>(
        "POST",
        "/spreadsheets",
        {
          json: {
            properties: { title },
            sheets: sheets.map((sheet) => ({
              properties: { title: sheet.title, sheetId: sheet.sheetId },
            })),
          },
        },
      );

      if (!response || typeof response.spreadsheetId !== "string") {
        throw new GoogleSheetsError(
          "Google Sheets create response missing spreadsheetId",
          { message: "missing spreadsheetId" },
        );
      }

      const sheetIds: Record<string, number> = {};
      for (const sheet of response.sheets ?? []) {
        const props = sheet.properties;
        if (props?.title !== undefined && props.sheetId !== undefined) {
          sheetIds[props.title] = props.sheetId;
        }
      }

      return {
        ok: true,
        data: {
          spreadsheetId: response.spreadsheetId,
          spreadsheetUrl:
            response.spreadsheetUrl ??
            `${GOOGLE_SHEETS_DOCUMENT_URL_BASE}${response.spreadsheetId}`,
          sheetIds,
        },
      };
    } catch (error) {
      return {
        ok: false,
        error: this.toErrorDetails(error, {}, "Failed to create Google spreadsheet"),
      };
    }
  }

  /**
   * Append rows after the table found at `range`
   *
   * Values are USER_ENTERED so formulas (e.g. =HYPERLINK) are evaluated.
   *
   * @param spreadsheetId - Target spreadsheet
   * @param range - A1 notation anchor (e.g., "Jobs!A1")
   * @param values - 2D array of values to append
   * @returns SheetOperationResult with append statistics or error details
   */
  async appendRows(
    spreadsheetId: string,
    range: string,
    values: SheetCellValue[][],
  ): Promise<SheetOperationResult<SheetAppendResult>> {
    logger.debug("Appending rows to Google Sheets", {
      spreadsheetId,
      range,
      rowCount: values.length,
    });

    try {
      const endpoint = `/spreadsheets/${spreadsheetId}/values/${encodeURIComponent(range)}:append`;
      const response = await this.apiRequest<SheetAppendResponse>("POST", endpoint, {
        query: {
          valueInputOption: GOOGLE_SHEETS_VALUE_INPUT_OPTION_USER_ENTERED,
          insertDataOption: GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS,
        },
        json: { values },
      });

      return {
        ok: true,
        data: {
          tableRange: response.tableRange,
          updates: {
            updatedRange: response.updates.updatedRange,
            updatedRows: response.updates.updatedRows,
            updatedColumns: response.updates.updatedColumns,
            updatedCells: response.updates.updatedCells,
          },
        },
      };
    } catch (error) {
      return {
        ok: false,
        error: this.toErrorDetails(
          error,
          { spreadsheetId, range },
          "Failed to append rows to Google Sheets",
        ),
      };
    }
  }

  /**
   * Apply structural requests (formatting, frozen rows, resizing)
   *
   * @param spreadsheetId - Target spreadsheet
   * @param requests - Sheets API Request objects
   */
  async batchUpdate(
    spreadsheetId: string,
    requests: unknown[],
  ): Promise<SheetOperationResult<SpreadsheetBatchUpdateResult>> {
    logger.debug("Applying Google Sheets batch update", {
      spreadsheetId,
      requestCount: requests.length,
    });

    try {
      const response = await this.apiRequest<SpreadsheetBatchUpdateResult>(
        "POST",
        `/spreadsheets/${spreadsheetId}:batchUpdate`,
        { json: { requests } },
      );
      return { ok: true, data: response };
    } catch (error) {
      return {
        ok: false,
        error: this.toErrorDetails(
          error,
          { spreadsheetId },
          "Failed to apply Google Sheets batch update",
        ),
      };
    }
  }
}
