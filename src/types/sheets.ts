/**
 * Job sheet type definitions
 */

/**
 * Column ids of the Jobs sheet, in sheet order
 */
export type JobSheetColumnId =
  | "company"
  | "title"
  | "location"
  | "salary"
  | "experience"
  | "skills"
  | "apply_link"
  | "description_preview"
  | "date_scraped";

/**
 * Options for writing a batch of rows to a new spreadsheet
 */
export type WriteJobsSheetOptions = {
  /** Full spreadsheet title (see buildSheetTitle) */
  title: string;
  /** Characters of description kept in the preview column */
  previewLength: number;
};

/**
 * Outcome of a successful sheet write
 */
export type WriteJobsSheetResult = {
  spreadsheetId: string;
  spreadsheetUrl: string;
  /** Data rows written (header excluded) */
  rowsWritten: number;
  /** False when the post-write formatting request failed */
  formatted: boolean;
};
