/**
 * Error thrown when a decision table is malformed.
 *
 * Not recoverable without fixing the source; the message is meant to be shown
 * to the table author verbatim and names the sheet and row where known.
 *
 * @module
 */

import { TabulaError } from './tabula-error.js';

export const TABLE_ERROR_TYPES = [
  'INVALID_FILE_FORMAT',
  'CORRUPTED_FILE',
  'MISSING_HEADERS',
  'INVALID_STRUCTURE',
  'EMPTY_TABLE',
  'SHEET_NOT_FOUND',
] as const;
export type TableErrorType = (typeof TABLE_ERROR_TYPES)[number];

export interface TableErrorLocation {
  source?: string;
  sheetName?: string;
  /** 1-based row number */
  row?: number;
}

export class TableValidationError extends TabulaError {
  override readonly statusCode = 400;
  override readonly code = 'TABLE_VALIDATION_ERROR';
  readonly errorType: TableErrorType;
  readonly source: string | undefined;
  readonly sheetName: string | undefined;
  readonly row: number | undefined;

  constructor(
    message: string,
    errorType: TableErrorType,
    location: TableErrorLocation = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TableValidationError';
    this.errorType = errorType;
    this.source = location.source;
    this.sheetName = location.sheetName;
    this.row = location.row;
  }

  /** Exposes the location as `details` for an API error handler. */
  get details(): TableErrorLocation & { errorType: TableErrorType } {
    return {
      errorType: this.errorType,
      ...(this.source !== undefined && { source: this.source }),
      ...(this.sheetName !== undefined && { sheetName: this.sheetName }),
      ...(this.row !== undefined && { row: this.row }),
    };
  }
}
