import { errorMessage } from '../errors.ts';
import { getAllRecords } from '../spreadsheet/sheet-operations.ts';
import { openSpreadsheet, type SpreadsheetRef } from '../spreadsheet/spreadsheet-management.ts';
import type { SheetMap, SyncContext, SyncReport, WorksheetOutcome } from '../types.ts';
import { insertNewRows } from './upsert.ts';

/**
 * Copy every configured worksheet into its table, one after the other.
 *
 * A spreadsheet that cannot be opened skips its group; a worksheet that fails
 * to load or insert is logged and the next worksheet runs.
 */
export async function runSync(context: SyncContext, sheetMap: SheetMap): Promise<SyncReport> {
  const { logger, gateway, store, onDrift } = context;
  const report: SyncReport = { worksheets: [], fileFailures: [], inserted: 0, failed: 0 };

  for (const [group, cfg] of Object.entries(sheetMap)) {
    const fileName = cfg.file_name;
    logger.info({ group, file: fileName }, `Processing file: ${fileName}`);

    let spreadsheet: SpreadsheetRef;
    try {
      spreadsheet = await openSpreadsheet(gateway, fileName, logger);
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ group, file: fileName, error: message }, `Could not open spreadsheet '${fileName}'`);
      report.fileFailures.push({ group, spreadsheet: fileName, error: message });
      continue;
    }

    for (const [worksheet, table] of Object.entries(cfg.sheet_file)) {
      const unit = { group, spreadsheet: fileName, worksheet, table };
      let outcome: WorksheetOutcome;
      try {
        logger.info(unit, `Loading sheet '${worksheet}' -> table '${table}'`);
        const rows = await getAllRecords(gateway, spreadsheet, worksheet, logger);

        if (rows.length === 0) {
          logger.info(unit, `Sheet ${worksheet} is empty, skipping.`);
          outcome = { ...unit, status: 'empty' };
        } else {
          const result = await insertNewRows(store, table, rows, { onDrift, logger });
          outcome = { ...unit, status: 'inserted', result };
          report.inserted += result.inserted;
        }
      } catch (error) {
        const message = errorMessage(error);
        logger.error({ ...unit, error: message }, `Failed loading sheet ${worksheet} into ${table}`);
        outcome = { ...unit, status: 'failed', error: message };
        report.failed += 1;
      }
      report.worksheets.push(outcome);
    }
  }

  return report;
}
