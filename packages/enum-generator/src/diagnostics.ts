/**
 * Inline diagnostics
 *
 * Per-rule problems are reported as comment lines inside the generated text.
 */

import type { MissingColumn, Resolution } from './types.js';

type FailedResolution = Extract<Resolution, { ok: false }>;

function comment(...lines: string[]): string {
  return lines.map(line => `// ${line.replace(/\r?\n/g, ' ')}`).join('\n') + '\n';
}

function describeMissing(kind: MissingColumn, failure: FailedResolution): string {
  switch (kind) {
    case 'id':
      return failure.idColumn ? `id column '${failure.idColumn}'` : 'id column (no primary key)';
    case 'description':
      return failure.descriptionColumn
        ? `description column '${failure.descriptionColumn}'`
        : 'description column (no string column)';
    case 'multiKey':
      return failure.multiKeyColumn
        ? `multi key column '${failure.multiKeyColumn}'`
        : 'multi key column (none given)';
  }
}

export function invalidPatternDiagnostic(rule: string, reason: string): string {
  return comment(`Enum rule '${rule}': invalid table pattern (${reason})`);
}

export function unresolvedDiagnostic(rule: string, tableName: string, failure: FailedResolution): string {
  const missing = failure.missing.map(kind => describeMissing(kind, failure)).join(', ');
  return comment(`Enum rule '${rule}' on table '${tableName}': could not resolve ${missing}`);
}

export function noRecordsDiagnostic(rule: string, tableName: string): string {
  return comment(`Table '${tableName}': no records for enum rule '${rule}'`);
}

export function queryFailedDiagnostic(rule: string, sql: string, message: string): string {
  return comment(`Enum rule '${rule}': query failed: ${sql}`, message);
}
