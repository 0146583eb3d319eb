/**
 * Job row mapper: OutputRow → sheet row
 *
 * Pure mapping, column order follows JOB_SHEET_COLUMNS.
 */

import type { JobSheetColumnId, OutputRow, SearchQuery } from "@/types";
import type { SheetCellValue } from "@/types/clients/googleSheets";
import {
  APPLY_LINK_LABEL,
  JOB_SHEET_COLUMNS,
  SKILLS_SEPARATOR,
} from "@/constants";

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local date as YYYY-MM-DD
 */
export function formatSheetDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/**
 * Local timestamp as YYYY-MM-DD HH:mm
 */
export function formatSheetTimestamp(date: Date): string {
  return `${formatSheetDate(date)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * Build a HYPERLINK formula; double quotes inside the URL are doubled
 */
export function buildApplyLinkFormula(url: string): string {
  const escaped = url.replace(/"/g, '""');
  return `=HYPERLINK("${escaped}","${APPLY_LINK_LABEL}")`;
}

/**
 * Keep scraped text literal under USER_ENTERED input
 *
 * A leading = + - or @ would make Sheets parse the cell as a formula;
 * the apostrophe prefix is hidden by Sheets and stores the text as-is.
 */
export function toLiteralText(value: string): string {
  return /^[=+\-@]/.test(value) ? `'${value}` : value;
}

/**
 * First `length` code points of a string (never splits a surrogate pair)
 */
export function truncateCodePoints(value: string, length: number): string {
  return Array.from(value).slice(0, Math.max(0, length)).join("");
}

/**
 * Map an OutputRow to the cells of one sheet row
 *
 * Only the apply link is a formula; every scraped text cell is literal.
 *
 * @param previewLength - Characters of description kept
 */
export function mapOutputRowToSheetRow(
  row: OutputRow,
  previewLength: number,
): SheetCellValue[] {
  const cells: Record<JobSheetColumnId, SheetCellValue> = {
    company: toLiteralText(row.company),
    title: toLiteralText(row.title),
    location: toLiteralText(row.location),
    salary: toLiteralText(row.salary ?? ""),
    experience: toLiteralText(row.experience ?? ""),
    skills: toLiteralText(row.skills.join(SKILLS_SEPARATOR)),
    apply_link: buildApplyLinkFormula(row.applyUrl),
    description_preview: toLiteralText(truncateCodePoints(row.description, previewLength)),
    date_scraped: formatSheetTimestamp(row.scrapedAt),
  };

  return JOB_SHEET_COLUMNS.map((column) => cells[column.id]);
}

/**
 * Spreadsheet title: prefix, then an em dash, then "<City>/<City> (<YYYY-MM-DD>)"
 *
 * Cities are the first comma-separated part of each query location,
 * unique, in query order.
 */
export function buildSheetTitle(
  prefix: string,
  queries: readonly SearchQuery[],
  now: Date,
): string {
  const cities: string[] = [];
  for (const query of queries) {
    const city = query.location.split(",")[0].trim();
    if (city && !cities.includes(city)) {
      cities.push(city);
    }
  }

  const date = formatSheetDate(now);
  return cities.length > 0
    ? `${prefix} — ${cities.join("/")} (${date})`
    : `${prefix} (${date})`;
}
