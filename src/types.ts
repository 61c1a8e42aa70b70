import type { Logger as PinoLogger } from 'pino';
import type { SheetMap } from './schemas/index.ts';
import type { SheetsGateway } from './spreadsheet/spreadsheet-management.ts';
import type { TableStore } from './sync/table-store.ts';

export type Logger = PinoLogger;

/** Scalar value of one cell; blank cells arrive as '' */
export type CellValue = string | number | null;

/** One worksheet record keyed by header name, in header order */
export type Row = Record<string, CellValue>;

export type SslMode = 'disable' | 'allow' | 'prefer' | 'require' | 'verify-ca' | 'verify-full';

export type DriftPolicy = 'error' | 'ignore' | 'extend';

export interface DatabaseConfig {
  host: string;
  database: string;
  user: string;
  password: string;
  port: number;
  sslMode: SslMode;
}

/** Service account key supplied inline (CI secret) or as a local key file */
export type CredentialSource = { type: 'json'; json: string } | { type: 'file'; path: string };

/**
 * Job configuration composed from CLI flags and environment
 */
export interface JobConfig {
  name: string;
  version: string;
  logLevel: string;
  logFile: string;
  configFile: string;
  onDrift: DriftPolicy;
  database: DatabaseConfig;
  credentials: CredentialSource;
}

export type ColumnType = 'text' | 'timestamp';

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
}

/** Versioned definition of a destination table as recorded in the schema registry */
export interface TableSchema {
  table: string;
  version: number;
  columns: ColumnDefinition[];
  naturalKey: string | null;
  conflictTarget: string;
}

export interface UpsertResult {
  table: string;
  conflictTarget: string | null;
  received: number;
  skipped: number;
  inserted: number;
  duplicates: number;
}

export type WorksheetOutcome =
  | { group: string; spreadsheet: string; worksheet: string; table: string; status: 'inserted'; result: UpsertResult }
  | { group: string; spreadsheet: string; worksheet: string; table: string; status: 'empty' }
  | { group: string; spreadsheet: string; worksheet: string; table: string; status: 'failed'; error: string };

export interface FileFailure {
  group: string;
  spreadsheet: string;
  error: string;
}

export interface SyncReport {
  worksheets: WorksheetOutcome[];
  fileFailures: FileFailure[];
  inserted: number;
  failed: number;
}

/** Everything one run needs, acquired once and passed explicitly */
export interface SyncContext {
  logger: Logger;
  gateway: SheetsGateway;
  store: TableStore;
  onDrift: DriftPolicy;
}

export interface GoogleApiError {
  response?: { status?: number };
  status?: number;
  statusCode?: number;
  code?: number | string;
  message?: string;
}

export type { SheetMap };
