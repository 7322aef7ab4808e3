import type { GraphRecord, TabularResult } from '@clinigraph/types';

/**
 * Fixed-column projection of query records. Missing keys become null;
 * zero records still yield the declared columns.
 */
export function project(records: readonly GraphRecord[], columns: readonly string[]): TabularResult {
  return {
    columns: [...columns],
    rows: records.map((record) => columns.map((column) => record[column] ?? null)),
  };
}

/**
 * Columns of an ad-hoc result, taken from the first record
 */
export function columnsOf(records: readonly GraphRecord[]): string[] {
  const first = records[0];
  return first ? Object.keys(first) : [];
}
