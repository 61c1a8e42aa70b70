import { z } from 'zod';

// Sheet map document: group name -> spreadsheet title and worksheet -> table mapping
export const SheetGroupSchema = z.object({
  file_name: z.string().min(1).describe('Exact title of the spreadsheet'),
  sheet_file: z.record(z.string().min(1), z.string().min(1)).default({}).describe('Worksheet title -> destination table name'),
});

export const SheetMapSchema = z.record(z.string(), SheetGroupSchema);

export type SheetGroup = z.infer<typeof SheetGroupSchema>;
export type SheetMap = z.infer<typeof SheetMapSchema>;

// Only the fields the token exchange needs are required; the rest of the key file passes through
export const ServiceAccountCredentialsSchema = z
  .object({
    type: z.literal('service_account').optional(),
    client_email: z.string().email(),
    private_key: z.string().min(1),
    project_id: z.string().optional(),
    private_key_id: z.string().optional(),
  })
  .passthrough();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountCredentialsSchema>;

export const SslModeSchema = z.enum(['disable', 'allow', 'prefer', 'require', 'verify-ca', 'verify-full']);

export const DriftPolicySchema = z.enum(['error', 'ignore', 'extend']);

export const PortSchema = z.coerce.number().int().min(1).max(65535);

export const ColumnDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['text', 'timestamp']),
});

// Row of the schema registry table as returned by pg (JSONB arrives parsed, INTEGER as number)
export const SchemaRegistryRowSchema = z.object({
  table_name: z.string(),
  version: z.coerce.number().int().positive(),
  columns: z.array(ColumnDefinitionSchema),
  natural_key: z.string().nullable(),
  conflict_target: z.string(),
});
