import { TIMESTAMP_COLUMN_ALIASES } from '../constants.ts';
import type { CellValue } from '../types.ts';

// Day 0 of spreadsheet serial dates (1899-12-30) is 25569 days before the Unix epoch
const SERIAL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;

// ISO date or date-time; a trailing zone designator is accepted and not applied
const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

export function isTimestampColumn(name: string): boolean {
  return TIMESTAMP_COLUMN_ALIASES.includes(name.trim().toLowerCase());
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** `YYYY-MM-DD HH:mm:ss.SSS` wall-clock text for a TIMESTAMP column */
export function formatTimestamp(date: Date, utc = false): string {
  const parts = utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds(), date.getUTCMilliseconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds()];
  const [year = 0, month = 0, day = 0, hours = 0, minutes = 0, seconds = 0, ms = 0] = parts;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(ms, 3)}`;
}

/**
 * Wall-clock text of an ISO date or date-time, exactly as written.
 * A zone designator is dropped: TIMESTAMP columns hold no zone.
 */
function parseIsoTimestamp(match: RegExpExecArray): string | null {
  const [, year = '', month = '', day = '', hours = '0', minutes = '0', seconds = '0', fraction = ''] = match;
  const parts = [Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes), Number(seconds), Number(fraction.slice(0, 3).padEnd(3, '0'))] as const;
  const date = new Date(Date.UTC(...parts));
  // Date.UTC rolls over out-of-range fields; reject instead
  if (date.getUTCFullYear() !== parts[0] || date.getUTCMonth() !== parts[1] || date.getUTCDate() !== parts[2] || date.getUTCHours() !== parts[3] || date.getUTCMinutes() !== parts[4] || date.getUTCSeconds() !== parts[5]) {
    return null;
  }
  return formatTimestamp(date, true);
}

/**
 * Parse a cell permissively.
 * ISO text keeps the wall-clock time it states, other text goes through the
 * JS date parser (local time), numbers are spreadsheet serial dates; blank or
 * unparseable values yield null.
 */
export function parseTimestamp(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const date = new Date(Math.round((value - SERIAL_EPOCH_OFFSET_DAYS) * MS_PER_DAY));
    return Number.isNaN(date.getTime()) ? null : formatTimestamp(date, true);
  }

  const text = value.trim();
  if (!text) return null;

  const iso = ISO_RE.exec(text);
  if (iso) return parseIsoTimestamp(iso);

  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : formatTimestamp(date);
}
