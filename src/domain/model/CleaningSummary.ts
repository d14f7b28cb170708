/** Counters for one cleaned table. Value counters count cells, not distinct values. */
export interface TableCleaningSummary {
  /** Rows in the input table. */
  readonly rows: number;
  readonly droppedRows: number;
  /** Canonical names of the fields that resolved to a column. */
  readonly resolvedFields: readonly string[];
  readonly unresolvedFields: readonly string[];
  readonly normalizedValues: number;
  readonly unparsableValues: number;
  readonly emptyValues: number;
}

export function emptySummary(rows: number): TableCleaningSummary {
  return {
    rows,
    droppedRows: 0,
    resolvedFields: [],
    unresolvedFields: [],
    normalizedValues: 0,
    unparsableValues: 0,
    emptyValues: 0,
  };
}
