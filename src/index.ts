import * as fs from 'fs';
import * as url from 'url';
import { errorMessage } from './errors.ts';
import { createConfig, handleVersionHelp } from './setup/config.ts';
import { createLogger, openSession, type SessionConnectors } from './setup/runtime.ts';
import { loadSheetMap } from './setup/sheet-map.ts';
import { runSync } from './sync/run-sync.ts';
import type { JobConfig, Logger, SyncReport } from './types.ts';

export { GOOGLE_SCOPE } from './constants.ts';
export * from './errors.ts';
export * as schemas from './schemas/index.ts';
export * as setup from './setup/index.ts';
export { runSync } from './sync/run-sync.ts';
export { insertNewRows } from './sync/upsert.ts';
export * from './types.ts';

/**
 * Run one sync: load the sheet map, open the session, copy every worksheet
 * and release the connection whatever happens.
 */
export async function startJob(config: JobConfig, logger: Logger, connectors?: SessionConnectors): Promise<SyncReport> {
  logger.info({ version: config.version }, 'Starting ETL job');

  const sheetMap = loadSheetMap(config.configFile);
  logger.info({ configFile: config.configFile, groups: Object.keys(sheetMap).length }, 'Loaded sheet map');

  const session = await openSession(config, logger, connectors);
  let report: SyncReport;
  try {
    report = await runSync(session.context, sheetMap);
  } finally {
    await session.close();
  }

  logger.info({ inserted: report.inserted, worksheets: report.worksheets.length, failedWorksheets: report.failed, failedFiles: report.fileFailures.length }, 'ETL job finished');
  return report;
}

export default async function main(): Promise<void> {
  // Check for help/version flags FIRST, before config parsing
  const versionHelpResult = handleVersionHelp(process.argv.slice(2));
  if (versionHelpResult.handled) {
    console.log(versionHelpResult.output);
    return;
  }

  let logger: Logger | undefined;
  try {
    const config = createConfig();
    logger = createLogger(config);
    await startJob(config, logger);
  } catch (error) {
    if (logger) logger.fatal({ error: errorMessage(error) }, 'ETL job failed');
    else console.error(`ETL job failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

const entry = process.argv[1];
if (entry && fs.realpathSync(entry) === url.fileURLToPath(import.meta.url)) {
  void main();
}
