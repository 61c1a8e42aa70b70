import * as fs from 'fs';
import { GoogleAuth } from 'google-auth-library';
import { GOOGLE_SCOPE } from '../constants.ts';
import { ConfigurationError, ConnectionError, errorMessage } from '../errors.ts';
import { type ServiceAccountCredentials, ServiceAccountCredentialsSchema } from '../schemas/index.ts';
import { createSheetsGateway, type SheetsGateway } from '../spreadsheet/spreadsheet-management.ts';
import type { CredentialSource, Logger } from '../types.ts';

/**
 * Read and validate the service account key.
 * Keys pasted into CI secrets often carry escaped newlines; those are restored.
 */
export function loadServiceAccountCredentials(source: CredentialSource): ServiceAccountCredentials {
  const origin = source.type === 'file' ? source.path : 'GOOGLE_CRED';

  let raw: unknown;
  try {
    raw = JSON.parse(source.type === 'file' ? fs.readFileSync(source.path, 'utf-8') : source.json);
  } catch (error) {
    throw new ConfigurationError(`Cannot read service account credentials from ${origin}: ${errorMessage(error)}`, error);
  }

  const parsed = ServiceAccountCredentialsSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigurationError(`Invalid service account credentials from ${origin} (check ${fields})`, parsed.error);
  }

  return { ...parsed.data, private_key: parsed.data.private_key.replace(/\\n/g, '\n') };
}

export function createGoogleAuth(credentials: ServiceAccountCredentials): GoogleAuth {
  return new GoogleAuth({
    credentials: { client_email: credentials.client_email, private_key: credentials.private_key },
    scopes: GOOGLE_SCOPE.split(' '),
  });
}

/**
 * Authenticate with the service account and return the Sheets gateway.
 * A token is fetched up front so bad credentials fail the run before any sheet is read.
 */
export async function connectGoogle(source: CredentialSource, logger: Logger): Promise<SheetsGateway> {
  const credentials = loadServiceAccountCredentials(source);
  const auth = createGoogleAuth(credentials);
  try {
    await auth.getAccessToken();
  } catch (error) {
    logger.error({ clientEmail: credentials.client_email, error: errorMessage(error) }, 'Failed to connect to Google Sheets');
    throw new ConnectionError(`Failed to connect to Google Sheets: ${errorMessage(error)}`, error);
  }
  logger.info({ clientEmail: credentials.client_email }, 'Connected to Google Sheets');
  return createSheetsGateway(auth);
}
