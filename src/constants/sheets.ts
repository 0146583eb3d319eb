/**
 * Google Sheets schema constants
 *
 * Defines the Jobs sheet layout written by the sheet writer.
 */

import type { JobSheetColumnId } from "@/types";

/**
 * Sheet name/tab for job rows
 */
export const JOB_SHEET_NAME = "Jobs";

/**
 * Numeric id given to the Jobs tab at creation (used by formatting requests)
 */
export const JOB_SHEET_ID = 0;

/**
 * Append target: the table starts at A1 (header row)
 */
export const JOB_SHEET_APPEND_RANGE = `${JOB_SHEET_NAME}!A1`;

/**
 * Complete column definition for the Jobs sheet
 *
 * This is the SINGLE SOURCE OF TRUTH for the sheet layout.
 */
export const JOB_SHEET_COLUMNS: ReadonlyArray<{
  id: JobSheetColumnId;
  header: string;
}> = [
  { id: "company", header: "Company" },
  { id: "title", header: "Title" },
  { id: "location", header: "Location" },
  { id: "salary", header: "Salary" },
  { id: "experience", header: "Experience Required" },
  { id: "skills", header: "Key Skills" },
  { id: "apply_link", header: "Apply Link" },
  { id: "description_preview", header: "Description (preview)" },
  { id: "date_scraped", header: "Date Scraped" },
];

export const JOB_SHEET_HEADERS = JOB_SHEET_COLUMNS.map((c) => c.header);

/**
 * Label shown for the Apply Link formula
 */
export const APPLY_LINK_LABEL = "View & Apply";

/**
 * Separator for the Key Skills column
 */
export const SKILLS_SEPARATOR = ", ";

/**
 * Default description preview length (characters)
 */
export const DEFAULT_PREVIEW_LENGTH = 500;

/**
 * Header row styling (RGB 0..1)
 */
export const HEADER_BACKGROUND_COLOR = { red: 0.23, green: 0.47, blue: 0.85 };
export const HEADER_FOREGROUND_COLOR = { red: 1, green: 1, blue: 1 };
