/**
 * @lookup-enums/db-introspector
 *
 * Database introspection package for MySQL and PostgreSQL databases.
 * Extracts table metadata and opens row sources for enum generation.
 */

// Export types
export type {
  DatabaseType,
  DatabaseConnection,
  IntrospectedDatabase,
  IntrospectedSchema,
  IntrospectedTable,
  IntrospectedColumn,
  IntrospectedForeignKey,
  IntrospectionResult,
  IntrospectionStats,
  ClosableRowSource,
  DatabaseSession,
} from './types.js';

// Export introspection functions and row sources
export {
  introspectMySQL,
  readMySQLDatabase,
  createMySQLPool,
  MySQLRowSource,
  type MySQLPoolLike,
} from './mysql.js';
export {
  introspectPostgreSQL,
  readPostgreSQLDatabase,
  createPostgreSQLPool,
  PostgreSQLRowSource,
  type PostgreSQLPoolLike,
} from './postgresql.js';

// Export conversion functions
export { toTableMetadata, toTableMetadataList, defaultSchemaFor, getIntrospectionStats } from './metadata.js';

// Export type mapping utilities
export { classifyType, baseTypeName, MYSQL_TYPES, POSTGRESQL_TYPES } from './type-mapping.js';

import type { DatabaseConnection, DatabaseSession, IntrospectionResult } from './types.js';
import { introspectMySQL, createMySQLPool, readMySQLDatabase, MySQLRowSource } from './mysql.js';
import type { MySQLPoolLike } from './mysql.js';
import {
  introspectPostgreSQL,
  createPostgreSQLPool,
  readPostgreSQLDatabase,
  PostgreSQLRowSource,
} from './postgresql.js';
import type { PostgreSQLPoolLike } from './postgresql.js';
import { defaultSchemaFor, getIntrospectionStats, toTableMetadataList } from './metadata.js';

/**
 * Pool constructors per dialect
 */
export interface PoolFactories {
  mysql: (config: DatabaseConnection) => MySQLPoolLike;
  postgresql: (config: DatabaseConnection) => PostgreSQLPoolLike;
}

export const defaultPoolFactories: PoolFactories = {
  mysql: createMySQLPool,
  postgresql: createPostgreSQLPool,
};

/**
 * Main introspection function that handles both MySQL and PostgreSQL
 */
export async function introspectDatabase(
  config: DatabaseConnection,
  factories: PoolFactories = defaultPoolFactories
): Promise<IntrospectionResult> {
  try {
    // Select introspection function based on database type
    const database =
      config.type === 'mysql'
        ? await introspectMySQL(config, factories.mysql)
        : await introspectPostgreSQL(config, factories.postgresql);

    // Convert to table metadata
    const tables = toTableMetadataList(database, defaultSchemaFor(config.type, config.database));

    // Get statistics
    const stats = getIntrospectionStats(database);

    return {
      success: true,
      database,
      tables,
      stats,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    return {
      success: false,
      error: errorMessage,
    };
  }
}

/**
 * Introspect and keep the pool open as a row source.
 * The caller must end the row source when generation is done.
 */
export async function connectDatabase(
  config: DatabaseConnection,
  factories: PoolFactories = defaultPoolFactories
): Promise<DatabaseSession> {
  const defaultSchema = defaultSchemaFor(config.type, config.database);

  if (config.type === 'mysql') {
    const pool = factories.mysql(config);
    try {
      const database = await readMySQLDatabase(pool, config.schemaFilter);
      return {
        database,
        tables: toTableMetadataList(database, defaultSchema),
        rowSource: new MySQLRowSource(pool),
      };
    } catch (error) {
      await pool.end();
      throw error;
    }
  }

  const pool = factories.postgresql(config);
  try {
    const database = await readPostgreSQLDatabase(pool, config.schemaFilter);
    return {
      database,
      tables: toTableMetadataList(database, defaultSchema),
      rowSource: new PostgreSQLRowSource(pool),
    };
  } catch (error) {
    await pool.end();
    throw error;
  }
}
