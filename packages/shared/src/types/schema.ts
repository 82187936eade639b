import { z } from 'zod';

// Database types
export const DatabaseTypeSchema = z.enum(['postgresql', 'mysql']);

export type DatabaseType = z.infer<typeof DatabaseTypeSchema>;

// Scalar classification of a column's native type
export const SystemTypeSchema = z.enum([
  'string',
  'number',
  'bigint',
  'boolean',
  'date',
  'binary',
  'json',
]);

export type SystemType = z.infer<typeof SystemTypeSchema>;

// Column metadata as seen by the enum generator
export const ColumnMetadataSchema = z.object({
  name: z.string().min(1),
  sysType: SystemTypeSchema,
  isPrimaryKey: z.boolean().default(false),
  isForeignKey: z.boolean().default(false),
});

export type ColumnMetadata = z.infer<typeof ColumnMetadataSchema>;

// Table metadata; columns keep their ordinal order
export const TableMetadataSchema = z.object({
  name: z.string().min(1),
  cleanName: z.string().min(1),
  schema: z.string().optional(),
  columns: z.array(ColumnMetadataSchema),
});

export type TableMetadata = z.infer<typeof TableMetadataSchema>;

/**
 * Whether a column holds text and can therefore label enum members.
 */
export function isStringColumn(column: ColumnMetadata): boolean {
  return column.sysType === 'string';
}

/**
 * Table reference as it appears in a FROM clause.
 */
export function tableReference(table: Pick<TableMetadata, 'name' | 'schema'>): string {
  return table.schema ? `${table.schema}.${table.name}` : table.name;
}
