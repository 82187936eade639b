/**
 * Enum generator types
 */

import type { RowSource, TableMetadata } from '@lookup-enums/shared';

/**
 * Default prefix marking the second rule field as a MULTI directive.
 */
export const DEFAULT_MULTI_PREFIX = 'MULTI=';

/**
 * One parsed rule line: `pattern[:enumName|MULTI=keyColumn[:idColumn[:descriptionColumn[:where]]]]`
 */
export interface Rule {
  readonly source: string;
  readonly tableNamePattern: string;
  readonly enumName: string;
  readonly isMulti: boolean;
  readonly multiKeyColumn: string;
  readonly idColumn: string;
  readonly descriptionColumn: string;
  readonly whereClause: string;
}

export interface RuleParseOptions {
  multiPrefix?: string;
}

export type PatternMatch =
  | { ok: true; matched: boolean }
  | { ok: false; reason: string };

export interface ResolvedSpec {
  table: TableMetadata;
  rule: Rule;
  idColumn: string;
  descriptionColumn: string;
  multiKeyColumn: string;
  isMulti: boolean;
  idIsString: boolean;
  enumName: string;
}

export type MissingColumn = 'id' | 'description' | 'multiKey';

export type Resolution =
  | { ok: true; spec: ResolvedSpec }
  | {
      ok: false;
      missing: MissingColumn[];
      idColumn: string;
      descriptionColumn: string;
      multiKeyColumn: string;
    };

export interface EnumMember {
  name: string;
  value: string;
}

export interface EnumBlock {
  enumName: string;
  idIsString: boolean;
  members: EnumMember[];
}

export type BlockResult =
  | { kind: 'blocks'; blocks: EnumBlock[] }
  | { kind: 'empty' };

/**
 * Output shape of one emitted type, chosen from the id column's type.
 */
export type EnumShape = 'numeric' | 'string';

export interface EmitInput {
  tableName: string;
  enumName: string;
  idColumn: string;
  descriptionColumn: string;
  members: EnumMember[];
  idIsString: boolean;
}

export interface GeneratorLogger {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}

export interface EnumGeneratorOptions {
  rules: readonly string[];
  rowSource: RowSource;
  multiPrefix?: string;
  logger?: GeneratorLogger;
}

export interface GeneratedTable {
  table: TableMetadata;
  text: string;
}
