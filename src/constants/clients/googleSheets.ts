/**
 * Google Sheets API client constants
 *
 * Base URLs, endpoints, and request options
 */

/**
 * Google Sheets API base URL
 */
export const GOOGLE_SHEETS_BASE_URL = "https://sheets.googleapis.com";

/**
 * Google Sheets API version path
 */
export const GOOGLE_SHEETS_API_VERSION = "/v4";

/**
 * Default timeout in milliseconds for API requests
 */
export const GOOGLE_SHEETS_DEFAULT_TIMEOUT_MS = 30000;

/**
 * Value input option for user-entered data (formulas are evaluated)
 */
export const GOOGLE_SHEETS_VALUE_INPUT_OPTION_USER_ENTERED = "USER_ENTERED";

/**
 * Insert data option: insert new rows
 */
export const GOOGLE_SHEETS_INSERT_DATA_OPTION_INSERT_ROWS = "INSERT_ROWS";

/**
 * Public URL of a spreadsheet; the id is appended
 */
export const GOOGLE_SHEETS_DOCUMENT_URL_BASE =
  "https://docs.google.com/spreadsheets/d/";
