/**
 * Row-Block Generator
 *
 * Turns the ordered row stream of one rule into enum blocks. In MULTI mode a
 * new block starts whenever the key value differs from the previous row's;
 * rows are never sorted or regrouped, so same-key rows must arrive together.
 */

import type { RowRecord } from '@lookup-enums/shared';
import { readColumn, sanitizeIdentifier } from '@lookup-enums/shared';
import { defaultEnumName } from './column-resolver.js';
import type { BlockResult, EnumBlock, EnumMember, ResolvedSpec } from './types.js';

export class BlockBuilder {
  private lastKeyVal = '';
  private rowCount = 0;
  private members: EnumMember[] = [];

  constructor(private readonly spec: ResolvedSpec) {}

  get count(): number {
    return this.rowCount;
  }

  /**
   * Add one row. Returns the block closed by a key change, if any.
   */
  push(row: RowRecord): EnumBlock | undefined {
    const { spec } = this;
    const name = sanitizeIdentifier(readColumn(row, spec.descriptionColumn));
    const value = readColumn(row, spec.idColumn);
    const keyVal = spec.isMulti ? sanitizeIdentifier(readColumn(row, spec.multiKeyColumn)) : '';

    let flushed: EnumBlock | undefined;
    if (this.rowCount > 0 && keyVal !== this.lastKeyVal) {
      flushed = this.flush();
    }

    this.members.push({ name, value });
    this.lastKeyVal = keyVal;
    this.rowCount++;

    return flushed;
  }

  /**
   * Close the last block. Returns undefined when no row was ever pushed.
   */
  finish(): EnumBlock | undefined {
    if (this.rowCount === 0) {
      return undefined;
    }
    return this.flush();
  }

  private flush(): EnumBlock {
    const { spec } = this;
    const block: EnumBlock = {
      enumName: spec.isMulti ? defaultEnumName(this.lastKeyVal, spec.idIsString) : spec.enumName,
      idIsString: spec.idIsString,
      members: this.members,
    };
    this.members = [];
    return block;
  }
}

/**
 * Run a complete row sequence through a BlockBuilder.
 */
export function buildBlocks(rows: Iterable<RowRecord>, spec: ResolvedSpec): BlockResult {
  const builder = new BlockBuilder(spec);
  const blocks: EnumBlock[] = [];

  for (const row of rows) {
    const flushed = builder.push(row);
    if (flushed) {
      blocks.push(flushed);
    }
  }

  const last = builder.finish();
  if (!last) {
    return { kind: 'empty' };
  }

  blocks.push(last);
  return { kind: 'blocks', blocks };
}
