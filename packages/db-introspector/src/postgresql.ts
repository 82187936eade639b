/**
 * PostgreSQL database introspection
 *
 * Connects to a PostgreSQL database and extracts the tables, columns, primary
 * keys and foreign-key columns needed to pick enum id and description columns.
 * Also provides the row source used to read lookup rows.
 */

import pg from 'pg';
import type { RowReader, RowRecord } from '@lookup-enums/shared';
import { arrayReader } from '@lookup-enums/shared';
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
const SYSTEM_SCHEMAS = ['pg_catalog', 'information_schema', 'pg_toast'];

/**
 * Pool surface used for catalog queries and the row source
 */
export interface PostgreSQLPoolLike {
  query(sql: string, values?: unknown[]): Promise<{ rows: RowRecord[] }>;
  connect(): Promise<{
    query(sql: string): Promise<{ rows: RowRecord[] }>;
    release(): void;
  }>;
  end(): Promise<void>;
}

/**
 * Create PostgreSQL connection pool
 */
export function createPostgreSQLPool(config: DatabaseConnection): pg.Pool {
  return new pg.Pool({
    host: config.host,
    port: config.port,
    user: config.username,
    password: config.password,
    database: config.database,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
    max: 4,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });
}

/**
 * Reads lookup rows one query at a time, each on its own pooled client.
 */
export class PostgreSQLRowSource implements ClosableRowSource {
  constructor(private readonly pool: PostgreSQLPoolLike) {}

  async open(sql: string): Promise<RowReader> {
    const client = await this.pool.connect();

    let rows: RowRecord[];
    try {
      ({ rows } = await client.query(sql));
    } catch (error) {
      client.release();
      throw error;
    }

    return arrayReader(rows, () => client.release());
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Introspect PostgreSQL database
 */
export async function introspectPostgreSQL(
  config: DatabaseConnection,
  createPool: (config: DatabaseConnection) => PostgreSQLPoolLike = createPostgreSQLPool
): Promise<IntrospectedDatabase> {
  const pool = createPool(config);

  try {
    return await readPostgreSQLDatabase(pool, config.schemaFilter);
  } finally {
    await pool.end();
  }
}

/**
 * Introspect through an existing pool, leaving it open
 */
export async function readPostgreSQLDatabase(
  pool: PostgreSQLPoolLike,
  schemaFilter?: string[]
): Promise<IntrospectedDatabase> {
  const schemasToIntrospect = await getSchemasToIntrospect(pool, schemaFilter);

  const schemas: IntrospectedSchema[] = [];
  for (const schemaName of schemasToIntrospect) {
    schemas.push(await introspectSchema(pool, schemaName));
  }

  return {
    schemas,
    databaseType: 'postgresql',
  };
}

/**
 * Get list of schemas to introspect
 */
async function getSchemasToIntrospect(
  pool: PostgreSQLPoolLike,
  schemaFilter?: string[]
): Promise<string[]> {
  const result = await pool.query(`
    SELECT schema_name
    FROM information_schema.schemata
    WHERE schema_name NOT IN (${SYSTEM_SCHEMAS.map(s => `'${s}'`).join(',')})
      AND schema_name NOT LIKE 'pg_%'
    ORDER BY schema_name
  `);

  let schemas = result.rows.map(row => String(row['schema_name']));

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
  pool: PostgreSQLPoolLike,
  schemaName: string
): Promise<IntrospectedSchema> {
  const tableResult = await pool.query(
    `
    SELECT c.relname AS table_name
    FROM pg_catalog.pg_class c
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1
      AND c.relkind = 'r'
    ORDER BY c.relname
    `,
    [schemaName]
  );

  const tables: IntrospectedTable[] = [];
  for (const tableRow of tableResult.rows) {
    tables.push(await introspectTable(pool, schemaName, String(tableRow['table_name'])));
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
  pool: PostgreSQLPoolLike,
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
  pool: PostgreSQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<IntrospectedColumn[]> {
  const result = await pool.query(
    `
    SELECT
      a.attname AS column_name,
      pg_catalog.format_type(a.atttypid, a.atttypmod) AS column_type
    FROM pg_catalog.pg_attribute a
    JOIN pg_catalog.pg_class c ON c.oid = a.attrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1
      AND c.relname = $2
      AND a.attnum > 0
      AND NOT a.attisdropped
    ORDER BY a.attnum
    `,
    [schemaName, tableName]
  );

  return result.rows.map(row => ({
    name: String(row['column_name']),
    type: String(row['column_type']),
  }));
}

/**
 * Get primary key columns
 */
async function getPrimaryKeys(
  pool: PostgreSQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<string[]> {
  const result = await pool.query(
    `
    SELECT a.attname AS column_name
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class c ON c.oid = con.conrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    JOIN pg_catalog.pg_attribute a ON a.attrelid = c.oid AND a.attnum = ANY(con.conkey)
    WHERE n.nspname = $1
      AND c.relname = $2
      AND con.contype = 'p'
    ORDER BY array_position(con.conkey, a.attnum)
    `,
    [schemaName, tableName]
  );

  return result.rows.map(row => String(row['column_name']));
}

/**
 * Get foreign-key columns
 */
async function getForeignKeys(
  pool: PostgreSQLPoolLike,
  schemaName: string,
  tableName: string
): Promise<IntrospectedForeignKey[]> {
  const result = await pool.query(
    `
    SELECT DISTINCT a.attname AS column_name
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class c ON c.oid = con.conrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    JOIN pg_catalog.pg_attribute a ON a.attrelid = c.oid AND a.attnum = ANY(con.conkey)
    WHERE n.nspname = $1
      AND c.relname = $2
      AND con.contype = 'f'
    ORDER BY a.attname
    `,
    [schemaName, tableName]
  );

  return result.rows.map(row => ({ column: String(row['column_name']) }));
}
