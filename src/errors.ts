export type SyncErrorCode = 'CONFIGURATION' | 'CONNECTION' | 'SPREADSHEET_NOT_FOUND' | 'WORKSHEET_NOT_FOUND' | 'WORKSHEET_FORMAT' | 'SCHEMA_DRIFT' | 'INSERT_FAILED';

/** Base error for every failure the sync job reports */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  override readonly cause?: unknown;

  constructor(message: string, code: SyncErrorCode, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = cause;
  }

  /** Configuration and connection failures abort the whole run */
  get fatal(): boolean {
    return this.code === 'CONFIGURATION' || this.code === 'CONNECTION';
  }
}

/** Missing environment variable, unreadable sheet map or invalid credentials */
export class ConfigurationError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION', cause);
  }
}

/** Google auth or database connection failure */
export class ConnectionError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONNECTION', cause);
  }
}

export class SpreadsheetNotFoundError extends SyncError {
  constructor(title: string, cause?: unknown) {
    super(`Spreadsheet not found: ${title}`, 'SPREADSHEET_NOT_FOUND', cause);
  }
}

export class WorksheetNotFoundError extends SyncError {
  constructor(spreadsheetTitle: string, worksheet: string) {
    super(`Worksheet "${worksheet}" not found in spreadsheet "${spreadsheetTitle}"`, 'WORKSHEET_NOT_FOUND');
  }
}

/** Header row cannot be turned into column names */
export class WorksheetFormatError extends SyncError {
  constructor(message: string) {
    super(message, 'WORKSHEET_FORMAT');
  }
}

/** Batch columns no longer match the registered table schema */
export class SchemaDriftError extends SyncError {
  readonly table: string;
  readonly added: string[];
  readonly removed: string[];

  constructor(message: string, drift: { table: string; added: string[]; removed: string[] }) {
    super(message, 'SCHEMA_DRIFT');
    this.table = drift.table;
    this.added = drift.added;
    this.removed = drift.removed;
  }
}

export class InsertError extends SyncError {
  constructor(table: string, cause?: unknown) {
    super(`Failed to insert rows into ${table}: ${errorMessage(cause)}`, 'INSERT_FAILED', cause);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
