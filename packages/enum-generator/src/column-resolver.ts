/**
 * Column Resolver
 *
 * Combines a rule with a table's columns into concrete column choices.
 * Blank id/description fields default to the first primary key and the first
 * plain string column; explicit names are kept even if no column matches.
 */

import type { TableMetadata } from '@lookup-enums/shared';
import { isStringColumn } from '@lookup-enums/shared';
import type { MissingColumn, Resolution, Rule } from './types.js';

/**
 * Enum name used when a non-MULTI rule does not name one.
 */
export function defaultEnumName(baseName: string, idIsString: boolean): string {
  return `${baseName}Enum${idIsString ? 'Str' : ''}`;
}

export function resolveColumns(table: TableMetadata, rule: Rule): Resolution {
  let idColumn = rule.idColumn;
  let descriptionColumn = rule.descriptionColumn;
  const multiKeyColumn = rule.isMulti ? rule.multiKeyColumn : '';

  let idFound = false;
  let idIsString = false;
  let descriptionFound = false;
  let multiKeyFound = false;

  for (const column of table.columns) {
    if (!idColumn && column.isPrimaryKey) {
      idColumn = column.name;
    }

    if (!descriptionColumn && !column.isPrimaryKey && !column.isForeignKey && isStringColumn(column)) {
      descriptionColumn = column.name;
    }

    if (column.name === idColumn) {
      idFound = true;
      idIsString = isStringColumn(column);
    }

    if (column.name === descriptionColumn) {
      descriptionFound = true;
    }

    if (rule.isMulti && column.name === multiKeyColumn) {
      multiKeyFound = true;
    }
  }

  const missing: MissingColumn[] = [];
  if (!idFound) missing.push('id');
  if (!descriptionFound) missing.push('description');
  if (rule.isMulti && !multiKeyFound) missing.push('multiKey');

  if (missing.length > 0) {
    return { ok: false, missing, idColumn, descriptionColumn, multiKeyColumn };
  }

  const enumName = rule.isMulti
    ? ''
    : rule.enumName || defaultEnumName(table.cleanName, idIsString);

  return {
    ok: true,
    spec: {
      table,
      rule,
      idColumn,
      descriptionColumn,
      multiKeyColumn,
      isMulti: rule.isMulti,
      idIsString,
      enumName,
    },
  };
}
