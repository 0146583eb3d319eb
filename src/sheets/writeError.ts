/**
 * WriteError: the spreadsheet could not be created or filled
 */

import type { GoogleSheetsErrorDetails } from "@/types/clients/googleSheets";

export type WriteStage = "create" | "append";

export class WriteError extends Error {
  public readonly stage: WriteStage;
  public readonly status?: number;
  public readonly details: GoogleSheetsErrorDetails;

  constructor(stage: WriteStage, details: GoogleSheetsErrorDetails) {
    super(
      `Sheet ${stage} failed${details.status !== undefined ? ` (HTTP ${details.status})` : ""}: ${details.message}`,
    );
    this.name = "WriteError";
    this.stage = stage;
    this.status = details.status;
    this.details = details;
  }
}

export function isWriteError(error: unknown): error is WriteError {
  return error instanceof WriteError;
}
