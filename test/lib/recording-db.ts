import type { QueryResult } from 'pg';
import type { Queryable } from '../../src/sync/pg-table-store.ts';

export interface RecordedQuery {
  text: string;
  values?: unknown[];
}

interface Response {
  pattern: RegExp;
  rows: Record<string, unknown>[];
  rowCount: number;
}

/**
 * Queryable that records statements.
 *
 * Each queued response answers the first later statement matching its
 * pattern; unmatched statements get no rows. Statements matching a failure
 * pattern reject.
 */
export class RecordingDb implements Queryable {
  readonly queries: RecordedQuery[] = [];
  private readonly responses: Response[] = [];
  private readonly failures: { pattern: RegExp; error: Error }[] = [];

  respond(pattern: RegExp, rows: Record<string, unknown>[], rowCount?: number): void {
    this.responses.push({ pattern, rows, rowCount: rowCount ?? rows.length });
  }

  failOn(pattern: RegExp, error: Error): void {
    this.failures.push({ pattern, error });
  }

  texts(): string[] {
    return this.queries.map((q) => q.text);
  }

  async query(text: string, values?: unknown[]): Promise<QueryResult> {
    this.queries.push(values === undefined ? { text } : { text, values });
    const failure = this.failures.find((f) => f.pattern.test(text));
    if (failure) throw failure.error;

    const idx = this.responses.findIndex((r) => r.pattern.test(text));
    const response = idx >= 0 ? this.responses.splice(idx, 1)[0] : undefined;
    return { command: text.split(' ')[0] ?? '', rowCount: response?.rowCount ?? 0, oid: 0, fields: [], rows: response?.rows ?? [] };
  }
}
