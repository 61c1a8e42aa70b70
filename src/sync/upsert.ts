import { ROW_HASH_COLUMN } from '../constants.ts';
import { InsertError } from '../errors.ts';
import type { CellValue, DriftPolicy, Logger, Row, TableSchema, UpsertResult } from '../types.ts';
import { computeRowHash, renderCellValue } from './row-hash.ts';
import { collectColumns, ensureTableSchema } from './table-schema.ts';
import type { TableStore } from './table-store.ts';
import { parseTimestamp } from './timestamps.ts';

export interface UpsertOptions {
  onDrift: DriftPolicy;
  logger: Logger;
}

function toText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === 'number' ? renderCellValue(value) : value;
}

/**
 * Bind values for one row in `columns` order, followed by its content hash
 * when the hash is the conflict target. The hash covers the written columns only.
 */
export function normalizeRow(row: Row, schema: TableSchema, columns: string[]): CellValue[] {
  const timestampColumns = new Set(schema.columns.filter((c) => c.type === 'timestamp').map((c) => c.name));
  const values = columns.map((name) => (timestampColumns.has(name) ? parseTimestamp(row[name]) : toText(row[name])));
  if (schema.conflictTarget === ROW_HASH_COLUMN) values.push(computeRowHash(row, columns));
  return values;
}

/**
 * Insert the worksheet rows whose identity is not yet in `table`.
 *
 * Schema creation and insertion share one transaction: the worksheet lands
 * completely or not at all. Duplicates are skipped by the database through
 * `ON CONFLICT DO NOTHING` on the schema's conflict target; rows with a blank
 * natural key are skipped before insertion.
 */
export async function insertNewRows(store: TableStore, table: string, rows: Row[], options: UpsertOptions): Promise<UpsertResult> {
  const { logger } = options;

  if (rows.length === 0) {
    logger.info({ table }, `No data to insert for ${table}`);
    return { table, conflictTarget: null, received: 0, skipped: 0, inserted: 0, duplicates: 0 };
  }

  const result = await store.transaction(async () => {
    const { schema, columns } = await ensureTableSchema(store, table, collectColumns(rows), options);

    const naturalKey = schema.naturalKey;
    const keyed = naturalKey ? rows.filter((row) => renderCellValue(row[naturalKey]).trim() !== '') : rows;
    const skipped = rows.length - keyed.length;
    if (skipped > 0) logger.warn({ table, naturalKey, skipped }, 'Skipping rows with a blank natural key');

    const insertColumns = schema.conflictTarget === ROW_HASH_COLUMN ? [...columns, ROW_HASH_COLUMN] : columns;
    const values = keyed.map((row) => normalizeRow(row, schema, columns));

    let inserted: number;
    try {
      inserted = await store.insertRows(table, insertColumns, values, schema.conflictTarget);
    } catch (error) {
      throw new InsertError(table, error);
    }

    return { table, conflictTarget: schema.conflictTarget, received: rows.length, skipped, inserted, duplicates: keyed.length - inserted };
  });

  logger.info({ table, conflictTarget: result.conflictTarget, received: result.received, inserted: result.inserted, duplicates: result.duplicates, skipped: result.skipped }, `Inserted ${result.inserted} new rows into ${table} (conflict on ${result.conflictTarget})`);
  return result;
}
