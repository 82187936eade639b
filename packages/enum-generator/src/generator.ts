/**
 * Enum-Generation Orchestrator
 *
 * Applies the configured rules, in order, to one table at a time and returns
 * the concatenated enum source plus inline diagnostics. Per-rule failures never
 * abort generation; they become comment lines in the output.
 */

import type { RowRecord, RowSource, TableMetadata } from '@lookup-enums/shared';
import { tableReference, withRows } from '@lookup-enums/shared';
import { BlockBuilder } from './block-generator.js';
import { resolveColumns } from './column-resolver.js';
import {
  invalidPatternDiagnostic,
  noRecordsDiagnostic,
  queryFailedDiagnostic,
  unresolvedDiagnostic,
} from './diagnostics.js';
import { emitEnum } from './emitters.js';
import { matchesTable, parseRules } from './rule-parser.js';
import type {
  EnumBlock,
  EnumGeneratorOptions,
  GeneratedTable,
  GeneratorLogger,
  ResolvedSpec,
  Rule,
} from './types.js';

const silentLogger: GeneratorLogger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Row query for a resolved rule; the key column is selected only in MULTI mode.
 */
export function buildRowQuery(spec: ResolvedSpec): string {
  const columns = [spec.idColumn, spec.descriptionColumn];
  if (spec.isMulti) {
    columns.push(spec.multiKeyColumn);
  }
  return `SELECT ${columns.join(',')} FROM ${tableReference(spec.table)} ${spec.rule.whereClause}`.trimEnd();
}

export class EnumGenerator {
  private readonly rules: readonly Rule[];
  private readonly rowSource: RowSource;
  private readonly logger: GeneratorLogger;

  constructor(options: EnumGeneratorOptions) {
    this.rules = Object.freeze(parseRules(options.rules, { multiPrefix: options.multiPrefix }));
    this.rowSource = options.rowSource;
    this.logger = options.logger ?? silentLogger;
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  /**
   * Generate the enum source for one table.
   */
  async generate(table: TableMetadata): Promise<string> {
    const parts: string[] = [];

    for (const rule of this.rules) {
      const match = matchesTable(rule, table.name);
      if (!match.ok) {
        this.logger.warn(`Invalid table pattern in rule '${rule.source}': ${match.reason}`);
        parts.push(invalidPatternDiagnostic(rule.source, match.reason));
        continue;
      }
      if (!match.matched) {
        continue;
      }

      this.logger.debug(`Rule '${rule.source}' matches table ${table.name}`);
      parts.push(...(await this.applyRule(table, rule)));
    }

    return parts.join('\n');
  }

  /**
   * Generate every table in order.
   */
  async generateAll(tables: readonly TableMetadata[]): Promise<GeneratedTable[]> {
    const results: GeneratedTable[] = [];
    for (const table of tables) {
      results.push({ table, text: await this.generate(table) });
    }
    return results;
  }

  private async applyRule(table: TableMetadata, rule: Rule): Promise<string[]> {
    const resolution = resolveColumns(table, rule);
    if (!resolution.ok) {
      this.logger.warn(`Rule '${rule.source}' could not resolve ${resolution.missing.join(', ')} on ${table.name}`);
      return [unresolvedDiagnostic(rule.source, table.name, resolution)];
    }

    const { spec } = resolution;
    const sql = buildRowQuery(spec);
    const parts: string[] = [];
    let blockCount = 0;
    const emit = (block: EnumBlock) => {
      blockCount++;
      parts.push(
        emitEnum({
          tableName: table.name,
          enumName: block.enumName,
          idColumn: spec.idColumn,
          descriptionColumn: spec.descriptionColumn,
          members: block.members,
          idIsString: block.idIsString,
        })
      );
    };

    this.logger.debug(`Querying: ${sql}`);

    try {
      const rowCount = await withRows(this.rowSource, sql, async (rows: AsyncIterable<RowRecord>) => {
        const builder = new BlockBuilder(spec);
        for await (const row of rows) {
          const flushed = builder.push(row);
          if (flushed) {
            emit(flushed);
          }
        }
        const last = builder.finish();
        if (last) {
          emit(last);
        }
        return builder.count;
      });

      if (rowCount === 0) {
        parts.push(noRecordsDiagnostic(rule.source, table.name));
      }

      this.logger.debug(`Rule '${rule.source}' produced ${blockCount} block(s) from ${rowCount} row(s)`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Query failed for rule '${rule.source}': ${message}`);
      parts.push(queryFailedDiagnostic(rule.source, sql, message));
    }

    return parts;
  }
}

export function createEnumGenerator(options: EnumGeneratorOptions): EnumGenerator {
  return new EnumGenerator(options);
}
