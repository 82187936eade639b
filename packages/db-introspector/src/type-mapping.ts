/**
 * Type mapping from database-specific types to system types
 */

import type { DatabaseType, SystemType } from '@lookup-enums/shared';
import { logger } from '@lookup-enums/shared';

/**
 * MySQL type to system type mapping
 */
export const MYSQL_TYPES: Record<string, SystemType> = {
  // Integer types
  'tinyint': 'number',
  'smallint': 'number',
  'mediumint': 'number',
  'int': 'number',
  'integer': 'number',
  'bigint': 'bigint',

  // String types
  'char': 'string',
  'varchar': 'string',
  'tinytext': 'string',
  'text': 'string',
  'mediumtext': 'string',
  'longtext': 'string',
  'enum': 'string',
  'set': 'string',

  // Binary types
  'binary': 'binary',
  'varbinary': 'binary',
  'tinyblob': 'binary',
  'blob': 'binary',
  'mediumblob': 'binary',
  'longblob': 'binary',
  'bit': 'binary',

  // Date/Time types
  'date': 'date',
  'datetime': 'date',
  'timestamp': 'date',
  'time': 'string',
  'year': 'number',

  // Numeric types
  'decimal': 'number',
  'numeric': 'number',
  'float': 'number',
  'double': 'number',
  'real': 'number',

  // Boolean type
  'boolean': 'boolean',
  'bool': 'boolean',

  // JSON type
  'json': 'json',
};

/**
 * PostgreSQL type to system type mapping
 */
export const POSTGRESQL_TYPES: Record<string, SystemType> = {
  // Integer types
  'smallint': 'number',
  'int2': 'number',
  'integer': 'number',
  'int': 'number',
  'int4': 'number',
  'bigint': 'bigint',
  'int8': 'bigint',
  'serial': 'number',
  'serial2': 'number',
  'serial4': 'number',
  'bigserial': 'bigint',
  'serial8': 'bigint',
  'smallserial': 'number',

  // String types
  'character varying': 'string',
  'varchar': 'string',
  'character': 'string',
  'char': 'string',
  'bpchar': 'string',
  'text': 'string',
  'citext': 'string',
  'name': 'string',
  'uuid': 'string',

  // Binary types
  'bytea': 'binary',

  // Date/Time types
  'date': 'date',
  'time': 'string',
  'time without time zone': 'string',
  'time with time zone': 'string',
  'timetz': 'string',
  'timestamp': 'date',
  'timestamp without time zone': 'date',
  'timestamp with time zone': 'date',
  'timestamptz': 'date',
  'interval': 'string',

  // Numeric types
  'numeric': 'number',
  'decimal': 'number',
  'real': 'number',
  'float4': 'number',
  'double precision': 'number',
  'float8': 'number',
  'money': 'string',

  // Boolean type
  'boolean': 'boolean',
  'bool': 'boolean',

  // JSON types
  'json': 'json',
  'jsonb': 'json',
};

/**
 * Strip length, precision and modifiers from a native type
 * Example: "VARCHAR(255)" → "varchar", "int(10) unsigned" → "int"
 */
export function baseTypeName(originalType: string): string {
  return originalType
    .toLowerCase()
    .replace(/\(.*?\)/g, '')
    .replace(/\b(unsigned|zerofill)\b/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Map a database type to its system type
 */
export function classifyType(originalType: string, databaseType: DatabaseType): SystemType {
  const baseType = baseTypeName(originalType);

  // Array columns come back as JSON-like lists
  if (baseType.endsWith('[]')) {
    return 'json';
  }

  const mappingTable = databaseType === 'mysql' ? MYSQL_TYPES : POSTGRESQL_TYPES;

  // Try exact match first
  const exact = mappingTable[baseType];
  if (exact) {
    return exact;
  }

  // Try partial match (for types like "character varying" with extra modifiers)
  for (const [dbType, systemType] of Object.entries(mappingTable)) {
    if (baseType.startsWith(dbType)) {
      return systemType;
    }
  }

  // Default to string if no mapping found
  logger.warn(`Unknown type "${originalType}" (${databaseType}), treating as string`);
  return 'string';
}
