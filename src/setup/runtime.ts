import * as fs from 'fs';
import * as path from 'path';
import pino from 'pino';
import { PgTableStore } from '../sync/pg-table-store.ts';
import type { JobConfig, Logger, SyncContext } from '../types.ts';
import { connectDatabase } from './database.ts';
import { connectGoogle } from './google-auth.ts';

const REDACT_PATHS = ['password', '*.password', 'private_key', '*.private_key', 'credentials'];

/** JSON-lines logger writing to the log file and stdout */
export function createLogger(config: Pick<JobConfig, 'logLevel' | 'logFile'>): Logger {
  fs.mkdirSync(path.dirname(config.logFile), { recursive: true });
  const streams = pino.multistream([
    { level: 'trace', stream: pino.destination({ dest: config.logFile, sync: true }) },
    { level: 'trace', stream: pino.destination(1) },
  ]);
  return pino({ level: config.logLevel, timestamp: pino.stdTimeFunctions.isoTime, redact: REDACT_PATHS }, streams);
}

export interface SyncSession {
  context: SyncContext;
  close: () => Promise<void>;
}

/** How a session reaches PostgreSQL and Google; tests swap in local stand-ins */
export interface SessionConnectors {
  connectDatabase: typeof connectDatabase;
  connectGoogle: typeof connectGoogle;
}

const DEFAULT_CONNECTORS: SessionConnectors = { connectDatabase, connectGoogle };

/**
 * Acquire the run's database connection and Google client.
 * If Google authentication fails the database connection is released before rethrowing.
 */
export async function openSession(config: JobConfig, logger: Logger, connectors: SessionConnectors = DEFAULT_CONNECTORS): Promise<SyncSession> {
  const database = await connectors.connectDatabase(config.database, logger);
  try {
    const gateway = await connectors.connectGoogle(config.credentials, logger);
    const store = new PgTableStore(database.db, logger);
    await store.ensureRegistry();
    return {
      context: { logger, gateway, store, onDrift: config.onDrift },
      close: database.close,
    };
  } catch (error) {
    await database.close();
    throw error;
  }
}
