import type { Client, ClientConfig } from 'pg';
import pg from 'pg';
import { ConnectionError, errorMessage } from '../errors.ts';
import type { Queryable } from '../sync/pg-table-store.ts';
import type { DatabaseConfig, Logger } from '../types.ts';

export interface DatabaseSession {
  db: Queryable;
  close(): Promise<void>;
}

/**
 * pg has no `sslmode` option and never falls back between plain and TLS
 * connections: disable/allow/prefer connect without TLS, require encrypts
 * without verifying, verify-ca/verify-full verify the server.
 */
export function toClientConfig(config: DatabaseConfig): ClientConfig {
  let ssl: ClientConfig['ssl'];
  if (config.sslMode === 'require') ssl = { rejectUnauthorized: false };
  else if (config.sslMode === 'verify-ca' || config.sslMode === 'verify-full') ssl = { rejectUnauthorized: true };
  else ssl = false;

  return {
    host: config.host,
    database: config.database,
    user: config.user,
    password: config.password,
    port: config.port,
    ssl,
  };
}

/**
 * Log errors the client emits while no query is running, such as the server
 * closing an idle connection. The next query then rejects and fails its worksheet.
 */
export function logClientErrors(client: Pick<Client, 'on'>, logger: Logger): void {
  client.on('error', (error: Error) => {
    logger.error({ error: errorMessage(error) }, 'PostgreSQL connection error');
  });
}

/** Open the run's single PostgreSQL connection */
export async function connectDatabase(config: DatabaseConfig, logger: Logger): Promise<DatabaseSession> {
  const client = new pg.Client(toClientConfig(config));
  logClientErrors(client, logger);
  try {
    await client.connect();
  } catch (error) {
    logger.error({ host: config.host, database: config.database, error: errorMessage(error) }, 'Failed to connect to PostgreSQL');
    throw new ConnectionError(`Failed to connect to PostgreSQL: ${errorMessage(error)}`, error);
  }
  logger.info({ host: config.host, database: config.database }, 'Connected to PostgreSQL');

  let closed = false;
  return {
    db: { query: (text, values) => client.query(text, values) },
    close: async () => {
      if (closed) return;
      closed = true;
      await client.end();
      logger.info('PostgreSQL connection closed');
    },
  };
}
