import { NATURAL_KEY_COLUMN, ROW_HASH_COLUMN } from '../constants.ts';
import { SchemaDriftError } from '../errors.ts';
import type { ColumnDefinition, DriftPolicy, Logger, Row, TableSchema } from '../types.ts';
import type { TableStore } from './table-store.ts';
import { isTimestampColumn } from './timestamps.ts';

export interface SchemaDrift {
  added: string[];
  removed: string[];
}

export interface EnsuredSchema {
  schema: TableSchema;
  /** Batch columns that will be written, in batch order */
  columns: string[];
}

/** Union of the rows' column names in first-seen order, without the hash column */
export function collectColumns(rows: Row[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const name of Object.keys(row)) {
      if (name === ROW_HASH_COLUMN || seen.has(name)) continue;
      seen.add(name);
      columns.push(name);
    }
  }
  return columns;
}

export function findNaturalKey(columns: string[]): string | null {
  return columns.find((name) => name.toLowerCase() === NATURAL_KEY_COLUMN) ?? null;
}

export function defineColumn(name: string): ColumnDefinition {
  return { name, type: isTimestampColumn(name) ? 'timestamp' : 'text' };
}

/**
 * Schema for a table first seen with `columns`.
 * The natural key governs conflicts when present; otherwise the row hash does.
 */
export function inferTableSchema(table: string, columns: string[]): TableSchema {
  const naturalKey = findNaturalKey(columns);
  return {
    table,
    version: 1,
    columns: [...columns.map(defineColumn), { name: ROW_HASH_COLUMN, type: 'text' }],
    naturalKey,
    conflictTarget: naturalKey ?? ROW_HASH_COLUMN,
  };
}

export function diffSchema(schema: TableSchema, columns: string[]): SchemaDrift {
  const known = schema.columns.map((c) => c.name).filter((name) => name !== ROW_HASH_COLUMN);
  return {
    added: columns.filter((name) => !known.includes(name)),
    removed: known.filter((name) => !columns.includes(name)),
  };
}

/**
 * Make sure `table` exists with a registered schema that can take the batch.
 *
 * First sight creates the table. Afterwards the registered schema is
 * authoritative: new columns are handled by `onDrift`, missing columns are
 * written as NULL, and a batch without the registered natural key is rejected.
 */
export async function ensureTableSchema(store: TableStore, table: string, columns: string[], options: { onDrift: DriftPolicy; logger: Logger }): Promise<EnsuredSchema> {
  const { onDrift, logger } = options;

  const existing = await store.loadSchema(table);
  if (!existing) {
    const schema = inferTableSchema(table, columns);
    await store.createTable(schema);
    return { schema, columns };
  }

  if (existing.naturalKey && !columns.includes(existing.naturalKey)) {
    throw new SchemaDriftError(`Batch for ${table} has no "${existing.naturalKey}" column, which is the table's natural key`, { table, added: [], removed: [existing.naturalKey] });
  }

  const { added, removed } = diffSchema(existing, columns);
  if (removed.length > 0) {
    logger.warn({ table, version: existing.version, removed }, 'Columns missing from batch will be stored as NULL');
  }
  if (added.length === 0) return { schema: existing, columns };

  if (onDrift === 'ignore') {
    logger.warn({ table, version: existing.version, added }, 'Ignoring columns not in the table schema');
    return { schema: existing, columns: columns.filter((name) => !added.includes(name)) };
  }

  if (onDrift === 'extend') {
    const newColumns = added.map(defineColumn);
    const schema: TableSchema = { ...existing, version: existing.version + 1, columns: [...existing.columns, ...newColumns] };
    await store.addColumns(schema, newColumns);
    logger.warn({ table, version: schema.version, added }, 'Extended table schema with new columns');
    return { schema, columns };
  }

  throw new SchemaDriftError(`Columns of ${table} drifted from schema version ${existing.version}: added ${added.join(', ')}`, { table, added, removed });
}
