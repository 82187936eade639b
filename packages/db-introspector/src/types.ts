/**
 * Database introspection types
 *
 * Defines the structure of introspected database schemas that will be
 * converted to table metadata for enum generation.
 */

import type { DatabaseType, RowSource, TableMetadata } from '@lookup-enums/shared';

export type { DatabaseType };

export interface DatabaseConnection {
  type: DatabaseType;
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  ssl?: boolean;
  schemaFilter?: string[];  // Specific schemas to introspect
}

export interface IntrospectedDatabase {
  schemas: IntrospectedSchema[];
  databaseType: DatabaseType;
}

export interface IntrospectedSchema {
  name: string;
  tables: IntrospectedTable[];
}

export interface IntrospectedTable {
  schema: string;
  name: string;
  columns: IntrospectedColumn[];
  primaryKeys: string[];
  foreignKeys: IntrospectedForeignKey[];
}

export interface IntrospectedColumn {
  name: string;
  type: string;              // Original DB type (e.g., "VARCHAR(255)", "INT UNSIGNED")
}

/**
 * Referencing side of a foreign key, one entry per column
 */
export interface IntrospectedForeignKey {
  column: string;
}

export interface IntrospectionStats {
  schemaCount: number;
  tableCount: number;
  foreignKeyCount: number;
}

export interface IntrospectionResult {
  success: boolean;
  database?: IntrospectedDatabase;
  tables?: TableMetadata[];
  error?: string;
  stats?: IntrospectionStats;
}

/**
 * Row source that owns a connection pool.
 */
export interface ClosableRowSource extends RowSource {
  end(): Promise<void>;
}

/**
 * Introspected tables plus an open row source over the same database.
 */
export interface DatabaseSession {
  database: IntrospectedDatabase;
  tables: TableMetadata[];
  rowSource: ClosableRowSource;
}
