/**
 * MySQL database introspection
 *
 * Connects to a MySQL database and extracts the tables, columns, primary keys
 * and foreign-key columns needed to pick enum id and description columns. Also
 * provides the row source used to read lookup rows.
 */

import mysql from 'mysql2/promise';
import type { Pool } from 'mysql2/promise';
import type { RowReader, RowRecord } from '@lookup-enums/shared';
import { arrayReader, isRowRecord } from '@lookup-enums/shared';
import type {
  ClosableRowSource,
  DatabaseConnection,
  IntrospectedDatabase,
  IntrospectedSchema,
  IntrospectedTable,
  IntrospectedColumn,
  IntrospectedForeignKey,
} from './types.js';

/**
 * System schemas to exclude from introspection
 */
const SYSTEM_SCHEMAS = ['mysql', 'information_schema', 'performance_schema', 'sys'];

/**
 * Pool surface used for catalog queries and the row source
 */
export interface MySQLPoolLike {
  query(sql: string, values?: unknown[]): Promise<[unknown, unknown]>;
  getConnection(): Promise<{
    query(sql: string): Promise<[unknown, unknown]>;
    release(): void;
  }>;
  end(): Promise<void>;
}

/**
 * Object rows of a query result; non-select results have none
 */
function toRows(result: unknown): RowRecord[] {
  return Array.isArray(result) ? result.filter(isRowRecord) : [];
}

async function selectRows(pool: MySQLPoolLike, sql: string, values?: unknown[]): Promise<RowRecord[]> {
  const [result] = await pool.query(sql, values);
  return toRows(result);
}

/**
 * Create MySQL connection pool
 */
export function createMySQLPool(config: DatabaseConnection): Pool {
  return mysql.createPool({
    host: config.host,
    port: config.port,
    user: config.username,
    password: config.password,
    database: config.database,
    ssl: config.ssl ? {} : undefined,
    connectionLimit: 4,
  });
}

/**
 * Reads lookup rows one query at a time, each on its own pooled connection.
 */
export class MySQLRowSource implements ClosableRowSource {
  constructor(private readonly pool: MySQLPoolLike) {}

  async open(sql: string): Promise<RowReader> {
    const connection = await this.pool.getConnection();

    let result: unknown;
    try {
      [result] = await connection.query(sql);
    } catch (error) {
      connection.release();
      throw error;
    }

    return arrayReader(toRows(result), () => connection.release());
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Introspect MySQL database
 */
export async function introspectMySQL(
  config: DatabaseConnection,
  createPool: (config: DatabaseConnection) => MySQLPoolLike = createMySQLPool
): Promise<IntrospectedDatabase> {
  const pool = createPool(config);

  try {
    return await readMySQLDatabase(pool, config.schemaFilter);
  } finally {
    await pool.end();
  }
}

/**
 * Introspect through an existing pool, leaving it open
 */
export async function readMySQLDatabase(
  pool: MySQLPoolLike,
  schemaFilter?: string[]
): Promise<IntrospectedDatabase> {
  const schemasToIntrospect = await getSchemasToIntrospect(pool, schemaFilter);

  const schemas: IntrospectedSchema[] = [];
  for (const schemaName of schemasToIntrospect) {
    schemas.push(await introspectSchema(pool, schemaName));
  }

  return {
    schemas,
    databaseType: 'mysql',
  };
}

/**
 * Get list of schemas to introspect
 */
async function getSchemasToIntrospect(
  pool: MySQLPoolLike,
  schemaFilter?: string[]
): Promise<string[]> {
  const rows = await selectRows(pool, `
    SELECT SCHEMA_NAME
    FROM information_schema.SCHEMATA
    WHERE SCHEMA_NAME NOT IN (${SYSTEM_SCHEMAS.map(s => `'${s}'`).join(',')})
    ORDER BY SCHEMA_NAME
  `);

  let schemas = rows.map(row => String(row['SCHEMA_NAME']));

  // Apply schema filter if provided
  if (schemaFilter && schemaFilter.length > 0) {
    schemas = schemas.filter(s => schemaFilter.includes(s));
  }

  return schemas;
}

/**
 * Introspect a single schema
 */
async function introspectSchema(
  pool: MySQLPoolLike,
  schemaName: string
): Promise<IntrospectedSchema> {
  const tableRows = await selectRows(
    pool,
    `
    SELECT TABLE_NAME
    FROM information_schema.TABLES
    WHERE TABLE_SCHEMA = ?
      AND TABLE_TYPE = 'BASE TABLE'
    ORDER BY TABLE_NAME
    `,
    [schemaName]
  );

  const tables: IntrospectedTable[] = [];
  for (const tableRow of tableRows) {
    tables.push(await introspectTable(pool, schemaName, String(tableRow['TABLE_NAME'])));
  }

  return {
    name: schemaName,
    tables,
  };
}

/**
 * Introspect a single table
 */
async function introspectTable(
  pool: MySQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<IntrospectedTable> {
  const columns = await getColumns(pool, schemaName, tableName);
  const primaryKeys = await getPrimaryKeys(pool, schemaName, tableName);
  const foreignKeys = await getForeignKeys(pool, schemaName, tableName);

  return {
    schema: schemaName,
    name: tableName,
    columns,
    primaryKeys,
    foreignKeys,
  };
}

/**
 * Get columns for a table, in ordinal order
 */
async function getColumns(
  pool: MySQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<IntrospectedColumn[]> {
  const rows = await selectRows(
    pool,
    `
    SELECT
      COLUMN_NAME,
      COLUMN_TYPE
    FROM information_schema.COLUMNS
    WHERE TABLE_SCHEMA = ?
      AND TABLE_NAME = ?
    ORDER BY ORDINAL_POSITION
    `,
    [schemaName, tableName]
  );

  return rows.map(row => ({
    name: String(row['COLUMN_NAME']),
    type: String(row['COLUMN_TYPE']),
  }));
}

/**
 * Get primary key columns
 */
async function getPrimaryKeys(
  pool: MySQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<string[]> {
  const rows = await selectRows(
    pool,
    `
    SELECT COLUMN_NAME
    FROM information_schema.KEY_COLUMN_USAGE
    WHERE TABLE_SCHEMA = ?
      AND TABLE_NAME = ?
      AND CONSTRAINT_NAME = 'PRIMARY'
    ORDER BY ORDINAL_POSITION
    `,
    [schemaName, tableName]
  );

  return rows.map(row => String(row['COLUMN_NAME']));
}

/**
 * Get foreign-key columns
 */
async function getForeignKeys(
  pool: MySQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<IntrospectedForeignKey[]> {
  const rows = await selectRows(
    pool,
    `
    SELECT DISTINCT COLUMN_NAME
    FROM information_schema.KEY_COLUMN_USAGE
    WHERE TABLE_SCHEMA = ?
      AND TABLE_NAME = ?
      AND REFERENCED_TABLE_NAME IS NOT NULL
    ORDER BY COLUMN_NAME
    `,
    [schemaName, tableName]
  );

  return rows.map(row => ({ column: String(row['COLUMN_NAME']) }));
}
