/** Content hashing for rows that carry no natural key */

import { createHash } from 'crypto';
import type { CellValue, Row } from '../types.ts';

/** String form of a cell used for hashing; absent values become '' */
export function renderCellValue(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isNaN(value) ? '' : String(value);
  return value;
}

/**
 * Canonical text of a row: [name, value] pairs sorted by column name.
 * Only `columns` are read, and blank values are left out so that an absent
 * column and an empty cell hash alike.
 *
 * @example
 * canonicalRow({ b: 2, a: null, c: '' })
 * // Returns: '[["b","2"]]'
 */
export function canonicalRow(row: Row, columns: string[] = Object.keys(row)): string {
  const pairs = [...columns]
    .sort()
    .map((key) => [key, renderCellValue(row[key])])
    .filter(([, value]) => value !== '');
  return JSON.stringify(pairs);
}

/**
 * SHA-256 hex digest of the canonical row.
 * Rows equal in every written column hash identically whatever their key order.
 */
export function computeRowHash(row: Row, columns?: string[]): string {
  return createHash('sha256').update(canonicalRow(row, columns), 'utf8').digest('hex');
}
