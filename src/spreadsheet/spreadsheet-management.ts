import type { GoogleAuth } from 'google-auth-library';
import { google } from 'googleapis';
import { SpreadsheetNotFoundError } from '../errors.ts';
import type { GoogleApiError, Logger } from '../types.ts';

export interface SpreadsheetRef {
  id: string;
  title: string;
  modifiedTime?: string;
}

/**
 * The slice of the Drive and Sheets APIs the job reads through.
 * Production wraps googleapis; tests provide an in-memory implementation.
 */
export interface SheetsGateway {
  /** Spreadsheets whose title equals `title`, most recently modified first */
  findSpreadsheetsByTitle(title: string): Promise<SpreadsheetRef[]>;
  getSheetTitles(spreadsheetId: string): Promise<string[]>;
  /** Rows of the A1 range as displayed in the sheet; trailing blank cells are omitted */
  getValues(spreadsheetId: string, range: string): Promise<unknown[][]>;
}

export function escapeDriveQueryValue(value: string): string {
  return String(value).replace(/['\\]/g, (m) => `\\${m}`);
}

export function createSheetsGateway(auth: GoogleAuth): SheetsGateway {
  const sheets = google.sheets({ version: 'v4', auth });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async findSpreadsheetsByTitle(title) {
      const q = `mimeType='application/vnd.google-apps.spreadsheet' and name = '${escapeDriveQueryValue(title)}' and trashed = false`;
      const resp = await drive.files.list({
        q,
        pageSize: 50,
        orderBy: 'modifiedTime desc',
        fields: 'files(id,name,modifiedTime)',
        includeItemsFromAllDrives: true,
        supportsAllDrives: true,
      });
      const files = resp.data?.files || [];
      return files.map((f) => ({ id: String(f.id), title: String(f.name), ...(f.modifiedTime ? { modifiedTime: f.modifiedTime } : {}) }));
    },

    async getSheetTitles(spreadsheetId) {
      const resp = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' });
      return (resp.data.sheets || []).map((s) => s.properties?.title ?? '');
    },

    async getValues(spreadsheetId, range) {
      const resp = await sheets.spreadsheets.values.get({ spreadsheetId, range, majorDimension: 'ROWS', valueRenderOption: 'FORMATTED_VALUE' });
      return Array.isArray(resp.data.values) ? resp.data.values : [];
    },
  };
}

export function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const apiError = error as GoogleApiError;
  const status = apiError.response?.status || apiError.status || apiError.statusCode || apiError.code;
  return Number(status) === 404;
}

/**
 * Open a spreadsheet by exact title.
 * When several files share the title the most recently modified one wins.
 */
export async function openSpreadsheet(gateway: SheetsGateway, title: string, logger: Logger): Promise<SpreadsheetRef> {
  let matches: SpreadsheetRef[];
  try {
    matches = await gateway.findSpreadsheetsByTitle(title);
  } catch (error) {
    if (isNotFound(error)) throw new SpreadsheetNotFoundError(title, error);
    throw error;
  }

  const [first] = matches;
  if (!first) throw new SpreadsheetNotFoundError(title);
  if (matches.length > 1) {
    logger.warn({ title, count: matches.length, chosen: first.id }, 'Several spreadsheets share this title, using the most recently modified');
  }
  return first;
}
