/**
 * Rule Parser
 *
 * Parses one configured rule line into a positional Rule. Parsing never fails:
 * missing fields default to empty strings and it is left to column resolution
 * to report what could not be found.
 */

import type { PatternMatch, Rule, RuleParseOptions } from './types.js';
import { DEFAULT_MULTI_PREFIX } from './types.js';

const FIELD_SEPARATOR = ':';
const MAX_FIELDS = 5;

/**
 * Split on the separator into at most MAX_FIELDS fields.
 * The last field keeps any remaining separators (where clauses may contain them).
 */
function splitFields(line: string): string[] {
  const parts = line.split(FIELD_SEPARATOR);
  const fields = parts.slice(0, MAX_FIELDS - 1);

  if (parts.length >= MAX_FIELDS) {
    fields.push(parts.slice(MAX_FIELDS - 1).join(FIELD_SEPARATOR));
  }

  while (fields.length < MAX_FIELDS) {
    fields.push('');
  }

  return fields.map(field => field.trim());
}

/**
 * Parse a rule line such as `tbl:MULTI=LookupKey:LookupVal:LookupDescLong`
 */
export function parseRule(line: string, options: RuleParseOptions = {}): Rule {
  const multiPrefix = options.multiPrefix ?? DEFAULT_MULTI_PREFIX;
  const [pattern = '', nameOrDirective = '', idColumn = '', descriptionColumn = '', whereClause = ''] =
    splitFields(line);

  const isMulti =
    multiPrefix.length > 0 &&
    nameOrDirective.toLowerCase().startsWith(multiPrefix.toLowerCase());

  return {
    source: line,
    tableNamePattern: pattern,
    enumName: isMulti ? '' : nameOrDirective,
    isMulti,
    multiKeyColumn: isMulti ? nameOrDirective.slice(multiPrefix.length).trim() : '',
    idColumn,
    descriptionColumn,
    whereClause,
  };
}

export function parseRules(lines: readonly string[], options: RuleParseOptions = {}): Rule[] {
  return lines.map(line => parseRule(line, options));
}

/**
 * Compile a table-name pattern, reporting a syntax error instead of throwing.
 */
export function compilePattern(pattern: string): { ok: true; regex: RegExp } | { ok: false; reason: string } {
  try {
    return { ok: true, regex: new RegExp(pattern, 'i') };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Test a rule's table-name pattern against a table name (case-insensitive, unanchored).
 */
export function matchesTable(rule: Rule, tableName: string): PatternMatch {
  const compiled = compilePattern(rule.tableNamePattern);
  if (!compiled.ok) {
    return compiled;
  }
  return { ok: true, matched: compiled.regex.test(tableName) };
}
