/**
 * Convert introspected database schema to table metadata
 *
 * Takes IntrospectedDatabase and produces the read-only TableMetadata view the
 * enum generator resolves rules against.
 */

import type { ColumnMetadata, DatabaseType, TableMetadata } from '@lookup-enums/shared';
import { sanitizeIdentifier } from '@lookup-enums/shared';
import type { IntrospectedDatabase, IntrospectedTable, IntrospectionStats } from './types.js';
import { classifyType } from './type-mapping.js';

/**
 * Schema that needs no qualifier in queries
 */
export function defaultSchemaFor(databaseType: DatabaseType, databaseName: string): string {
  return databaseType === 'postgresql' ? 'public' : databaseName;
}

/**
 * Convert a table to metadata
 */
export function toTableMetadata(
  table: IntrospectedTable,
  databaseType: DatabaseType,
  defaultSchema?: string
): TableMetadata {
  const foreignKeyColumns = new Set(table.foreignKeys.map(fk => fk.column));

  const columns: ColumnMetadata[] = table.columns.map(column => ({
    name: column.name,
    sysType: classifyType(column.type, databaseType),
    isPrimaryKey: table.primaryKeys.includes(column.name),
    isForeignKey: foreignKeyColumns.has(column.name),
  }));

  return {
    name: table.name,
    cleanName: sanitizeIdentifier(table.name),
    schema: table.schema && table.schema !== defaultSchema ? table.schema : undefined,
    columns,
  };
}

/**
 * Flatten every schema's tables into metadata, schema by schema
 */
export function toTableMetadataList(database: IntrospectedDatabase, defaultSchema?: string): TableMetadata[] {
  return database.schemas.flatMap(schema =>
    schema.tables.map(table => toTableMetadata(table, database.databaseType, defaultSchema))
  );
}

/**
 * Generate statistics about the introspection
 */
export function getIntrospectionStats(database: IntrospectedDatabase): IntrospectionStats {
  let tableCount = 0;
  let foreignKeyCount = 0;

  for (const schema of database.schemas) {
    tableCount += schema.tables.length;

    for (const table of schema.tables) {
      foreignKeyCount += table.foreignKeys.length;
    }
  }

  return {
    schemaCount: database.schemas.length,
    tableCount,
    foreignKeyCount,
  };
}
