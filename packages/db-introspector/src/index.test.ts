import { describe, it, expect } from 'vitest';
import type { RowRecord } from '@lookup-enums/shared';
import { connectDatabase, introspectDatabase } from './index.js';
import type { PoolFactories } from './index.js';
import type { MySQLPoolLike } from './mysql.js';
import type { PostgreSQLPoolLike } from './postgresql.js';
import type { DatabaseConnection } from './types.js';

type CatalogAnswer = (values: unknown[]) => RowRecord[];

const pgConfig: DatabaseConnection = {
  type: 'postgresql',
  host: 'localhost',
  port: 5432,
  database: 'shop',
  username: 'reader',
  password: 'test-secret',
};

const mysqlConfig: DatabaseConnection = { ...pgConfig, type: 'mysql', port: 3306 };

const pgCatalog: Array<[string, CatalogAnswer]> = [
  ['information_schema.schemata', () => [{ schema_name: 'public' }, { schema_name: 'ref' }]],
  [
    "c.relkind = 'r'",
    ([schema]) => (schema === 'public' ? [{ table_name: 'categories' }] : [{ table_name: 'order_status' }]),
  ],
  [
    'format_type',
    ([, table]) =>
      table === 'categories'
        ? [
            { column_name: 'category_id', column_type: 'integer' },
            { column_name: 'parent_code', column_type: 'character varying(8)' },
            { column_name: 'category_name', column_type: 'character varying(40)' },
          ]
        : [
            { column_name: 'code', column_type: 'character(1)' },
            { column_name: 'label', column_type: 'text' },
          ],
  ],
  [
    "con.contype = 'p'",
    ([, table]) => [{ column_name: table === 'categories' ? 'category_id' : 'code' }],
  ],
  ["con.contype = 'f'", ([, table]) => (table === 'categories' ? [{ column_name: 'parent_code' }] : [])],
];

const mysqlCatalog: Array<[string, CatalogAnswer]> = [
  ['information_schema.SCHEMATA', () => [{ SCHEMA_NAME: 'shop' }]],
  ['information_schema.TABLES', () => [{ TABLE_NAME: 'lookups' }]],
  [
    'information_schema.COLUMNS',
    () => [
      { COLUMN_NAME: 'lookup_key', COLUMN_TYPE: 'varchar(40)' },
      { COLUMN_NAME: 'lookup_val', COLUMN_TYPE: 'char(1)' },
      { COLUMN_NAME: 'lookup_desc', COLUMN_TYPE: 'varchar(100)' },
    ],
  ],
  ["CONSTRAINT_NAME = 'PRIMARY'", () => [{ COLUMN_NAME: 'lookup_key' }, { COLUMN_NAME: 'lookup_val' }]],
  ['REFERENCED_TABLE_NAME IS NOT NULL', () => []],
];

function answer(catalog: Array<[string, CatalogAnswer]>, sql: string, values: unknown[]): RowRecord[] {
  const entry = catalog.find(([marker]) => sql.includes(marker));
  if (!entry) {
    throw new Error(`Unexpected query: ${sql}`);
  }
  return entry[1](values);
}

function createCatalogPgPool(catalog: Array<[string, CatalogAnswer]> | Error, log: string[]): PostgreSQLPoolLike {
  return {
    async query(sql: string, values: unknown[] = []) {
      if (catalog instanceof Error) throw catalog;
      return { rows: answer(catalog, sql, values) };
    },
    async connect() {
      throw new Error('row reads are not expected');
    },
    async end() {
      log.push('end');
    },
  };
}

function createCatalogMySQLPool(catalog: Array<[string, CatalogAnswer]>, log: string[]): MySQLPoolLike {
  return {
    async query(sql: string, values: unknown[] = []): Promise<[unknown, unknown]> {
      return [answer(catalog, sql, values), []];
    },
    async getConnection() {
      throw new Error('row reads are not expected');
    },
    async end() {
      log.push('end');
    },
  };
}

function factoriesFor(pools: Partial<PoolFactories>): PoolFactories {
  return {
    mysql: () => {
      throw new Error('mysql pool not expected');
    },
    postgresql: () => {
      throw new Error('postgresql pool not expected');
    },
    ...pools,
  };
}

describe('introspectDatabase', () => {
  it('should read PostgreSQL metadata, stats and close the pool', async () => {
    const log: string[] = [];
    const pool = createCatalogPgPool(pgCatalog, log);

    const result = await introspectDatabase(pgConfig, factoriesFor({ postgresql: () => pool }));

    expect(result.success).toBe(true);
    expect(result.stats).toEqual({ schemaCount: 2, tableCount: 2, foreignKeyCount: 1 });
    expect(result.tables).toEqual([
      {
        name: 'categories',
        cleanName: 'categories',
        schema: undefined,
        columns: [
          { name: 'category_id', sysType: 'number', isPrimaryKey: true, isForeignKey: false },
          { name: 'parent_code', sysType: 'string', isPrimaryKey: false, isForeignKey: true },
          { name: 'category_name', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
        ],
      },
      {
        name: 'order_status',
        cleanName: 'order_status',
        schema: 'ref',
        columns: [
          { name: 'code', sysType: 'string', isPrimaryKey: true, isForeignKey: false },
          { name: 'label', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
        ],
      },
    ]);
    expect(log).toEqual(['end']);
  });

  it('should only read the filtered schemas', async () => {
    const pool = createCatalogPgPool(pgCatalog, []);

    const result = await introspectDatabase(
      { ...pgConfig, schemaFilter: ['ref'] },
      factoriesFor({ postgresql: () => pool })
    );

    expect(result.tables?.map(table => table.name)).toEqual(['order_status']);
  });

  it('should read MySQL metadata with the database as default schema', async () => {
    const pool = createCatalogMySQLPool(mysqlCatalog, []);

    const result = await introspectDatabase(mysqlConfig, factoriesFor({ mysql: () => pool }));

    expect(result.stats).toEqual({ schemaCount: 1, tableCount: 1, foreignKeyCount: 0 });
    expect(result.tables).toEqual([
      {
        name: 'lookups',
        cleanName: 'lookups',
        schema: undefined,
        columns: [
          { name: 'lookup_key', sysType: 'string', isPrimaryKey: true, isForeignKey: false },
          { name: 'lookup_val', sysType: 'string', isPrimaryKey: true, isForeignKey: false },
          { name: 'lookup_desc', sysType: 'string', isPrimaryKey: false, isForeignKey: false },
        ],
      },
    ]);
  });

  it('should return the error and close the pool when a query fails', async () => {
    const log: string[] = [];
    const pool = createCatalogPgPool(new Error('password authentication failed for user "reader"'), log);

    const result = await introspectDatabase(pgConfig, factoriesFor({ postgresql: () => pool }));

    expect(result).toEqual({
      success: false,
      error: 'password authentication failed for user "reader"',
    });
    expect(log).toEqual(['end']);
  });
});

describe('connectDatabase', () => {
  it('should keep the pool open until the row source ends', async () => {
    const log: string[] = [];
    const pool = createCatalogPgPool(pgCatalog, log);

    const session = await connectDatabase(pgConfig, factoriesFor({ postgresql: () => pool }));

    expect(session.tables.map(table => table.name)).toEqual(['categories', 'order_status']);
    expect(log).toEqual([]);

    await session.rowSource.end();
    expect(log).toEqual(['end']);
  });

  it('should end the pool when introspection fails', async () => {
    const log: string[] = [];
    const pool = createCatalogPgPool(new Error('connect ECONNREFUSED 127.0.0.1:5432'), log);

    await expect(connectDatabase(pgConfig, factoriesFor({ postgresql: () => pool }))).rejects.toThrow(
      'connect ECONNREFUSED 127.0.0.1:5432'
    );
    expect(log).toEqual(['end']);
  });

  it('should open a MySQL session', async () => {
    const log: string[] = [];
    const pool = createCatalogMySQLPool(mysqlCatalog, log);

    const session = await connectDatabase(mysqlConfig, factoriesFor({ mysql: () => pool }));

    expect(session.database.databaseType).toBe('mysql');
    expect(session.tables.map(table => table.name)).toEqual(['lookups']);
  });
});
