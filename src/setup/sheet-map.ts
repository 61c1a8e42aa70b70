import * as fs from 'fs';
import { ConfigurationError, errorMessage } from '../errors.ts';
import { type SheetMap, SheetMapSchema } from '../schemas/index.ts';

/** Read and validate the sheet map document */
export function loadSheetMap(configFile: string): SheetMap {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read sheet map ${configFile}: ${errorMessage(error)}`, error);
  }

  const parsed = SheetMapSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid sheet map ${configFile}: ${issues}`, parsed.error);
  }
  return parsed.data;
}
