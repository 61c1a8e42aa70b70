export { createConfig, handleVersionHelp, parseConfig, parseDatabaseConfig } from './config.ts';
export { connectDatabase, type DatabaseSession, toClientConfig } from './database.ts';
export { connectGoogle, createGoogleAuth, loadServiceAccountCredentials } from './google-auth.ts';
export * from './runtime.ts';
export { loadSheetMap } from './sheet-map.ts';
