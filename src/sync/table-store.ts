import type { CellValue, ColumnDefinition, TableSchema } from '../types.ts';

/**
 * Destination storage for synced worksheets.
 *
 * `PgTableStore` is the PostgreSQL implementation. All methods run on the
 * store's single connection, so calls made inside `transaction` share it.
 */
export interface TableStore {
  /** Registered schema of a destination table, or null before its first sync */
  loadSchema(table: string): Promise<TableSchema | null>;
  /** Create the table and the unique index on its conflict target, then register the schema */
  createTable(schema: TableSchema): Promise<void>;
  /** Add columns to an existing table and register the new schema version */
  addColumns(schema: TableSchema, columns: ColumnDefinition[]): Promise<void>;
  /**
   * Insert rows, skipping any whose conflict target value already exists.
   * Resolves to the number of rows actually inserted.
   */
  insertRows(table: string, columns: string[], rows: CellValue[][], conflictTarget: string): Promise<number>;
  /** Run `fn` atomically: commit when it resolves, roll back when it rejects */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}
