import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_CONFIG_FILE } from '../constants.ts';
import { ConfigurationError } from '../errors.ts';
import { DriftPolicySchema, PortSchema, SslModeSchema } from '../schemas/index.ts';
import type { CredentialSource, DatabaseConfig, JobConfig } from '../types.ts';

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });

const pkg = PackageJsonSchema.parse(JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));

const REQUIRED_DATABASE_ENV = ['POSTGRES_HOST', 'POSTGRES_DB', 'POSTGRES_USER', 'POSTGRES_PASSWORD', 'POSTGRES_PORT'] as const;

const HELP_TEXT = `
Usage: sheets-pg-sync [options]

Copy Google Sheets worksheets into PostgreSQL tables, inserting only rows that are not already present.

Options:
  --version                  Show version number
  --help                     Show this help message
  --config=<path>            Sheet map document (default: ./config.json)
  --credentials-file=<path>  Service account key file (overrides GOOGLE_CRED)
  --on-drift=<policy>        Column drift policy: error, ignore, extend (default: error)
  --log-level=<level>        Logging level (default: info)
  --log-file=<path>          Log file (default: ./logs/sheets-pg-sync.log)

Environment Variables:
  POSTGRES_HOST              Database host (REQUIRED)
  POSTGRES_DB                Database name (REQUIRED)
  POSTGRES_USER              Database user (REQUIRED)
  POSTGRES_PASSWORD          Database password (REQUIRED)
  POSTGRES_PORT              Database port (REQUIRED)
  PGSSLMODE                  disable, allow, prefer, require, verify-ca, verify-full (default: prefer)
                             disable, allow and prefer connect without TLS; use require or
                             verify-full for servers that need TLS
  GOOGLE_CRED                Service account key JSON payload
  GOOGLE_APPLICATION_CREDENTIALS  Service account key file (used when GOOGLE_CRED is unset)
  SHEET_CONFIG               Sheet map document (optional, same as --config)
  SCHEMA_DRIFT               Column drift policy (optional, same as --on-drift)
  LOG_LEVEL                  Logging level (optional)
  LOG_FILE                   Log file (optional)

Examples:
  sheets-pg-sync                                   # Use ./config.json and GOOGLE_CRED
  sheets-pg-sync --credentials-file=./gsa.json     # Local key file
  sheets-pg-sync --on-drift=extend                 # Add new spreadsheet columns to tables
`.trim();

/**
 * Handle --version and --help flags before config parsing.
 * These should work without requiring any configuration.
 */
export function handleVersionHelp(args: string[]): { handled: boolean; output?: string } {
  const { values } = parseArgs({
    args,
    options: {
      version: { type: 'boolean' },
      help: { type: 'boolean' },
    },
    strict: false,
  });

  if (values.version) return { handled: true, output: pkg.version };
  if (values.help) return { handled: true, output: HELP_TEXT };
  return { handled: false };
}

/**
 * Parse job configuration from CLI arguments and environment.
 *
 * CLI flags win over their environment variable. Database variables are all
 * required; a service account credential must come from --credentials-file,
 * GOOGLE_CRED or GOOGLE_APPLICATION_CREDENTIALS, in that order.
 *
 * @throws ConfigurationError when a required value is missing or invalid
 */
export function parseConfig(args: string[], env: Record<string, string | undefined>): JobConfig {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      'credentials-file': { type: 'string' },
      'on-drift': { type: 'string' },
      'log-level': { type: 'string' },
      'log-file': { type: 'string' },
    },
    strict: false, // Allow other arguments
    allowPositionals: true,
  });

  const name = pkg.name.replace(/^@[^/]+\//, '');

  const cliConfig = typeof values.config === 'string' ? values.config : undefined;
  const configFile = path.resolve(cliConfig ?? env.SHEET_CONFIG ?? DEFAULT_CONFIG_FILE);

  const cliLogLevel = typeof values['log-level'] === 'string' ? values['log-level'] : undefined;
  const logLevel = cliLogLevel ?? env.LOG_LEVEL ?? 'info';

  const cliLogFile = typeof values['log-file'] === 'string' ? values['log-file'] : undefined;
  const logFile = path.resolve(cliLogFile ?? env.LOG_FILE ?? path.join('logs', `${name}.log`));

  const cliDrift = typeof values['on-drift'] === 'string' ? values['on-drift'] : undefined;
  const drift = DriftPolicySchema.safeParse(cliDrift ?? env.SCHEMA_DRIFT ?? 'error');
  if (!drift.success) throw new ConfigurationError(`Invalid drift policy "${cliDrift ?? env.SCHEMA_DRIFT}" (expected error, ignore or extend)`);

  const cliCredentialsFile = typeof values['credentials-file'] === 'string' ? values['credentials-file'] : undefined;

  return {
    name,
    version: pkg.version,
    logLevel,
    logFile,
    configFile,
    onDrift: drift.data,
    database: parseDatabaseConfig(env),
    credentials: parseCredentialSource(cliCredentialsFile, env),
  };
}

export function parseDatabaseConfig(env: Record<string, string | undefined>): DatabaseConfig {
  const missing = REQUIRED_DATABASE_ENV.filter((key) => !env[key]);
  if (missing.length > 0) throw new ConfigurationError(`Missing required env vars: ${missing.join(', ')}`);

  const port = PortSchema.safeParse(env.POSTGRES_PORT);
  if (!port.success) throw new ConfigurationError(`Invalid POSTGRES_PORT "${env.POSTGRES_PORT}"`);

  const sslMode = SslModeSchema.safeParse(env.PGSSLMODE || 'prefer');
  if (!sslMode.success) throw new ConfigurationError(`Invalid PGSSLMODE "${env.PGSSLMODE}"`);

  return {
    host: env.POSTGRES_HOST ?? '',
    database: env.POSTGRES_DB ?? '',
    user: env.POSTGRES_USER ?? '',
    password: env.POSTGRES_PASSWORD ?? '',
    port: port.data,
    sslMode: sslMode.data,
  };
}

function parseCredentialSource(cliCredentialsFile: string | undefined, env: Record<string, string | undefined>): CredentialSource {
  if (cliCredentialsFile) return { type: 'file', path: path.resolve(cliCredentialsFile) };
  if (env.GOOGLE_CRED) return { type: 'json', json: env.GOOGLE_CRED };
  if (env.GOOGLE_APPLICATION_CREDENTIALS) return { type: 'file', path: path.resolve(env.GOOGLE_APPLICATION_CREDENTIALS) };
  throw new ConfigurationError('Missing Google service account credentials. Set GOOGLE_CRED, GOOGLE_APPLICATION_CREDENTIALS or use --credentials-file.');
}

/**
 * Build production configuration from process globals.
 * Entry point for the job.
 */
export function createConfig(): JobConfig {
  return parseConfig(process.argv.slice(2), process.env);
}
