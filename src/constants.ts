/**
 * Sheets to Postgres sync constants
 *
 * Scopes, column conventions and registry names are fixed by the job rather than
 * externally configured since the job only ever reads from Google.
 */

// Google OAuth scopes required to resolve spreadsheets by title and read their values
export const GOOGLE_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly https://www.googleapis.com/auth/drive.readonly';

// Column holding the content hash of rows that carry no natural key
export const ROW_HASH_COLUMN = '_row_hash';

// Natural key column, matched case-insensitively
export const NATURAL_KEY_COLUMN = 'cdn';

// Column names (lower-cased) declared as TIMESTAMP
export const TIMESTAMP_COLUMN_ALIASES: readonly string[] = ['submitted at', 'submitted_at', 'timestamp', 'created_at'];

// Table recording the versioned schema of every destination table
export const SCHEMA_REGISTRY_TABLE = '_sheet_sync_schemas';

// Postgres rejects statements with more bind parameters than this
export const MAX_BIND_PARAMETERS = 65535;

export const DEFAULT_CONFIG_FILE = 'config.json';
