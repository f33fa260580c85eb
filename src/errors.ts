export type SpreadsheetErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'MALFORMED_CONTAINER'
  | 'WORKBOOK_OPEN'
  | 'SHEET_NOT_FOUND'
  | 'SHEET_TRUNCATED'
  | 'WORKBOOK_CLOSED'
  | 'SOURCE_REJECTED';

export abstract class SpreadsheetError extends Error {
  abstract readonly code: SpreadsheetErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedFormatError extends SpreadsheetError {
  readonly code = 'UNSUPPORTED_FORMAT';
}

/** Structural framing of the container or of a table inside it is violated. */
export class MalformedContainerError extends SpreadsheetError {
  readonly code = 'MALFORMED_CONTAINER';
}

export class WorkbookOpenError extends SpreadsheetError {
  readonly code = 'WORKBOOK_OPEN';
}

export class SheetNotFoundError extends SpreadsheetError {
  readonly code = 'SHEET_NOT_FOUND';

  constructor(readonly sheet: number | string) {
    super(typeof sheet === 'number' ? `No sheet at index ${sheet}` : `No sheet named "${sheet}"`);
  }
}

export class SheetTruncatedError extends SpreadsheetError {
  readonly code = 'SHEET_TRUNCATED';

  constructor(readonly sheet: string, message: string, options?: { cause?: unknown }) {
    super(`Sheet "${sheet}" is truncated: ${message}`, options);
  }
}

export class WorkbookClosedError extends SpreadsheetError {
  readonly code = 'WORKBOOK_CLOSED';

  constructor() {
    super('Workbook has been closed');
  }
}

export class SourceRejectedError extends SpreadsheetError {
  readonly code = 'SOURCE_REJECTED';

  constructor(readonly issues: string[]) {
    super(`Source rejected: ${issues.join('; ')}`);
  }
}

/**
 * Raised by record and XML readers when the row stream cannot continue.
 * Cursors turn it into a `SheetTruncatedError` scoped to their sheet.
 */
export class StreamFramingError extends Error {
  constructor(message: string, readonly offset?: number) {
    super(offset === undefined ? message : `${message} at offset ${offset}`);
    this.name = 'StreamFramingError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
