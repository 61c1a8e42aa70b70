import type { QueryResult } from 'pg';
import { MAX_BIND_PARAMETERS, ROW_HASH_COLUMN, SCHEMA_REGISTRY_TABLE } from '../constants.ts';
import { errorMessage } from '../errors.ts';
import { SchemaRegistryRowSchema } from '../schemas/index.ts';
import type { CellValue, ColumnDefinition, ColumnType, Logger, TableSchema } from '../types.ts';
import type { TableStore } from './table-store.ts';

/** The one pg call the store makes; satisfied by a connected `pg.Client` */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

const POSTGRES_TYPE_MAP: Record<ColumnType, string> = {
  text: 'TEXT',
  timestamp: 'TIMESTAMP',
};

const REGISTRY_SQL = `CREATE TABLE IF NOT EXISTS "${SCHEMA_REGISTRY_TABLE}" (
	table_name TEXT PRIMARY KEY,
	version INTEGER NOT NULL,
	columns JSONB NOT NULL,
	natural_key TEXT,
	conflict_target TEXT NOT NULL,
	updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`;

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function uniqueIndexName(table: string, conflictTarget: string): string {
  const suffix = conflictTarget === ROW_HASH_COLUMN ? 'rowhash' : conflictTarget.toLowerCase();
  return `${table}_${suffix}_uniq`;
}

export function buildCreateTableSql(schema: TableSchema): string {
  const columnDefs = schema.columns.map((c) => `${quoteIdent(c.name)} ${POSTGRES_TYPE_MAP[c.type]}`).join(', ');
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(schema.table)} (${columnDefs})`;
}

export function buildUniqueIndexSql(schema: TableSchema): string {
  return `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdent(uniqueIndexName(schema.table, schema.conflictTarget))} ON ${quoteIdent(schema.table)} (${quoteIdent(schema.conflictTarget)})`;
}

/**
 * Multi-row parameterised INSERT statements, chunked so no statement carries
 * more bind parameters than Postgres accepts.
 */
export function buildInsertStatements(table: string, columns: string[], rows: CellValue[][], conflictTarget: string): { text: string; values: CellValue[] }[] {
  if (columns.length === 0 || rows.length === 0) return [];
  const rowsPerStatement = Math.max(1, Math.floor(MAX_BIND_PARAMETERS / columns.length));
  const columnList = columns.map(quoteIdent).join(', ');
  const statements: { text: string; values: CellValue[] }[] = [];

  for (let start = 0; start < rows.length; start += rowsPerStatement) {
    const chunk = rows.slice(start, start + rowsPerStatement);
    const values: CellValue[] = [];
    const tuples = chunk.map((row) => {
      const placeholders = columns.map((_, idx) => {
        values.push(row[idx] ?? null);
        return `$${values.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });
    statements.push({
      text: `INSERT INTO ${quoteIdent(table)} (${columnList})
VALUES ${tuples.join(', ')}
ON CONFLICT (${quoteIdent(conflictTarget)}) DO NOTHING`,
      values,
    });
  }
  return statements;
}

/**
 * PostgreSQL table store.
 *
 * Destination tables are append-only. Their schemas are recorded in the
 * registry table, created on first use.
 */
export class PgTableStore implements TableStore {
  private readonly db: Queryable;
  private readonly logger: Logger;
  private registryReady = false;

  constructor(db: Queryable, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /** Create the schema registry table if it does not exist yet */
  async ensureRegistry(): Promise<void> {
    if (this.registryReady) return;
    await this.db.query(REGISTRY_SQL);
    this.registryReady = true;
  }

  async loadSchema(table: string): Promise<TableSchema | null> {
    await this.ensureRegistry();
    const result = await this.db.query(`SELECT table_name, version, columns, natural_key, conflict_target FROM "${SCHEMA_REGISTRY_TABLE}" WHERE table_name = $1`, [table]);
    const [row] = result.rows;
    if (!row) return null;

    const parsed = SchemaRegistryRowSchema.parse(row);
    return {
      table: parsed.table_name,
      version: parsed.version,
      columns: parsed.columns,
      naturalKey: parsed.natural_key,
      conflictTarget: parsed.conflict_target,
    };
  }

  async createTable(schema: TableSchema): Promise<void> {
    await this.ensureRegistry();
    await this.db.query(buildCreateTableSql(schema));
    await this.db.query(buildUniqueIndexSql(schema));
    await this.saveSchema(schema);
    this.logger.info({ table: schema.table, columns: schema.columns.length, conflictTarget: schema.conflictTarget }, 'Created table');
  }

  async addColumns(schema: TableSchema, columns: ColumnDefinition[]): Promise<void> {
    await this.ensureRegistry();
    for (const column of columns) {
      await this.db.query(`ALTER TABLE ${quoteIdent(schema.table)} ADD COLUMN IF NOT EXISTS ${quoteIdent(column.name)} ${POSTGRES_TYPE_MAP[column.type]}`);
    }
    await this.saveSchema(schema);
  }

  async insertRows(table: string, columns: string[], rows: CellValue[][], conflictTarget: string): Promise<number> {
    let inserted = 0;
    for (const statement of buildInsertStatements(table, columns, rows, conflictTarget)) {
      const result = await this.db.query(statement.text, statement.values);
      inserted += result.rowCount ?? 0;
    }
    return inserted;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    // Registry DDL stays outside worksheet transactions so a rollback cannot undo it
    await this.ensureRegistry();
    await this.db.query('BEGIN');
    try {
      const result = await fn();
      await this.db.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await this.db.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.error({ error: errorMessage(rollbackError) }, 'Rollback failed');
      }
      throw error;
    }
  }

  private async saveSchema(schema: TableSchema): Promise<void> {
    await this.db.query(
      `INSERT INTO "${SCHEMA_REGISTRY_TABLE}" (table_name, version, columns, natural_key, conflict_target)
VALUES ($1, $2, $3, $4, $5)
ON CONFLICT (table_name) DO UPDATE SET version = EXCLUDED.version, columns = EXCLUDED.columns, natural_key = EXCLUDED.natural_key, conflict_target = EXCLUDED.conflict_target, updated_at = now()`,
      [schema.table, schema.version, JSON.stringify(schema.columns), schema.naturalKey, schema.conflictTarget]
    );
  }
}
