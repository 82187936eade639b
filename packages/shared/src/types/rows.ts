/**
 * Row source contracts
 *
 * A row source runs one read-only query and hands back a forward-only reader.
 * Callers must release the reader once it is drained or has failed.
 */

/**
 * One fetched row, keyed by column name as returned by the driver.
 */
export type RowRecord = Record<string, unknown>;

export interface RowReader extends AsyncIterable<RowRecord> {
  /** Return the underlying connection. Safe to call more than once. */
  release(): Promise<void>;
}

export interface RowSource {
  open(sql: string): Promise<RowReader>;
}

/**
 * Reader over rows that are already in memory. `release` runs once.
 */
export function arrayReader(rows: readonly RowRecord[], release: () => void | Promise<void>): RowReader {
  let released = false;
  return {
    async *[Symbol.asyncIterator]() {
      yield* rows;
    },
    async release() {
      if (released) return;
      released = true;
      await release();
    },
  };
}

export function isRowRecord(value: unknown): value is RowRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Open a reader, hand it to `consume` and release it whatever happens.
 */
export async function withRows<T>(
  source: RowSource,
  sql: string,
  consume: (rows: AsyncIterable<RowRecord>) => Promise<T>
): Promise<T> {
  const reader = await source.open(sql);
  try {
    return await consume(reader);
  } finally {
    await reader.release();
  }
}

/**
 * Render a driver value as the text the generator works with.
 */
export function rowValueToText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('hex');
  }
  return String(value);
}

/**
 * Look up a column value case-insensitively when the exact key is absent.
 * PostgreSQL folds unquoted identifiers to lower case in result rows.
 */
export function readColumn(row: RowRecord, column: string): string {
  if (Object.hasOwn(row, column)) {
    return rowValueToText(row[column]);
  }
  const lower = column.toLowerCase();
  for (const key of Object.keys(row)) {
    if (key.toLowerCase() === lower) {
      return rowValueToText(row[key]);
    }
  }
  return '';
}
