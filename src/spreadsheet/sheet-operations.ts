import { WorksheetFormatError, WorksheetNotFoundError } from '../errors.ts';
import type { CellValue, Logger, Row } from '../types.ts';
import type { SheetsGateway, SpreadsheetRef } from './spreadsheet-management.ts';

/** A1 range covering a whole sheet; single quotes in titles are doubled */
export function sheetRange(sheetTitle: string): string {
  return `'${sheetTitle.replace(/'/g, "''")}'`;
}

export function findSheetByTitle(titles: string[], sheetRef: string, logger: Logger): string | null {
  const trimmedRef = sheetRef.trim();
  if (!trimmedRef) return null;

  // Strategy 1: exact title match
  const exact = titles.find((t) => t === sheetRef);
  if (exact !== undefined) return exact;

  // Strategy 2: case-insensitive + trimmed title match
  const loose = titles.find((t) => t.trim().toLowerCase() === trimmedRef.toLowerCase());
  if (loose !== undefined) {
    logger.debug({ sheetRef, matched: loose }, 'findSheetByTitle case-insensitive match');
    return loose;
  }

  return null;
}

/**
 * Convert numeric text to a number when the number prints back as the same text.
 * Anything else keeps its displayed form: leading zeros, trailing decimal
 * zeros, exponents, signs and integers beyond the safe range.
 */
export function numericise(value: string): string | number {
  const trimmed = value.trim();
  if (!trimmed) return value;
  const n = Number(trimmed);
  return Number.isFinite(n) && String(n) === trimmed ? n : value;
}

function toCellValue(raw: unknown): CellValue {
  if (raw === null || raw === undefined) return '';
  if (typeof raw === 'number') return raw;
  return numericise(String(raw));
}

/**
 * Turn a values grid into records keyed by the header row.
 *
 * Blank header cells drop their column, duplicate headers are rejected,
 * short rows are padded with '' and rows with no content are skipped.
 */
export function recordsFromValues(values: unknown[][], sheetTitle: string): Row[] {
  const [headerRow, ...dataRows] = values;
  if (!headerRow) return [];

  const header = headerRow.map((cell) => (cell === null || cell === undefined ? '' : String(cell).trim()));
  const seen = new Set<string>();
  for (const name of header) {
    if (!name) continue;
    if (seen.has(name)) throw new WorksheetFormatError(`Worksheet "${sheetTitle}" has a duplicate header "${name}"`);
    seen.add(name);
  }

  const records: Row[] = [];
  for (const raw of dataRows) {
    const hasContent = raw.some((cell) => cell !== null && cell !== undefined && String(cell).trim() !== '');
    if (!hasContent) continue;

    const row: Row = {};
    header.forEach((name, idx) => {
      if (!name) return;
      row[name] = toCellValue(raw[idx]);
    });
    records.push(row);
  }
  return records;
}

/** Fetch every record of a worksheet, resolving its title first */
export async function getAllRecords(gateway: SheetsGateway, spreadsheet: SpreadsheetRef, worksheet: string, logger: Logger): Promise<Row[]> {
  const titles = await gateway.getSheetTitles(spreadsheet.id);
  const sheetTitle = findSheetByTitle(titles, worksheet, logger);
  if (sheetTitle === null) {
    logger.warn({ spreadsheet: spreadsheet.title, worksheet, availableTitles: titles }, 'Worksheet not found');
    throw new WorksheetNotFoundError(spreadsheet.title, worksheet);
  }

  const values = await gateway.getValues(spreadsheet.id, sheetRange(sheetTitle));
  const records = recordsFromValues(values, sheetTitle);
  logger.debug({ spreadsheet: spreadsheet.title, worksheet: sheetTitle, rowCount: records.length }, 'Fetched worksheet records');
  return records;
}
