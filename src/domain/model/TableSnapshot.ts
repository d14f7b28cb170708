/** One named column of a table. */
export interface TableColumn {
  readonly name: string;
  readonly values: readonly string[];
}

/**
 * In-memory rectangular table of string cells.
 *
 * Column-major: every column holds the same number of values, and a row is the
 * set of values sharing an index. Columns are identified by position, so two
 * columns may share a name. Snapshots are never mutated; every operation
 * returns a new snapshot.
 */
export interface TableSnapshot {
  readonly columns: readonly TableColumn[];
  /** Field delimiter of the file the table was read from, when known. Writers reuse it. */
  readonly delimiter?: string;
}

/** Build a snapshot from a header and row-major data. Short rows are padded with `''`, long rows truncated. */
export function createTableSnapshot(header: readonly string[], rows: readonly (readonly string[])[]): TableSnapshot {
  return {
    columns: header.map((name, col) => ({
      name,
      values: rows.map((row) => row[col] ?? ''),
    })),
  };
}

export function columnNames(table: TableSnapshot): string[] {
  return table.columns.map((column) => column.name);
}

export function rowCount(table: TableSnapshot): number {
  return table.columns[0]?.values.length ?? 0;
}

/** Values of the column at `index`. Throws if the column does not exist. */
export function columnValues(table: TableSnapshot, index: number): readonly string[] {
  const column = table.columns[index];
  if (!column) {
    throw new Error(`Column ${String(index)} does not exist (table has ${String(table.columns.length)} columns)`);
  }
  return column.values;
}

/** Replace the values of the column at `index`, keeping its name and position. */
export function replaceColumn(table: TableSnapshot, index: number, values: readonly string[]): TableSnapshot {
  assertColumnLength(table, values);
  columnValues(table, index);
  return {
    ...table,
    columns: table.columns.map((column, i) => (i === index ? { name: column.name, values } : column)),
  };
}

/** Overwrite the first column called `name`, or append it when no such column exists. */
export function upsertColumn(table: TableSnapshot, name: string, values: readonly string[]): TableSnapshot {
  assertColumnLength(table, values);
  const existing = table.columns.findIndex((column) => column.name === name);
  if (existing >= 0) {
    return replaceColumn(table, existing, values);
  }
  return { ...table, columns: [...table.columns, { name, values }] };
}

/** Remove the rows whose indices are in `rows`. Row order is preserved. */
export function dropRows(table: TableSnapshot, rows: ReadonlySet<number>): TableSnapshot {
  if (rows.size === 0) return table;
  return {
    ...table,
    columns: table.columns.map((column) => ({
      name: column.name,
      values: column.values.filter((_value, row) => !rows.has(row)),
    })),
  };
}

/** Row-major view of the data, without the header. */
export function toRows(table: TableSnapshot): string[][] {
  const rows: string[][] = [];
  const count = rowCount(table);
  for (let row = 0; row < count; row++) {
    rows.push(table.columns.map((column) => column.values[row] ?? ''));
  }
  return rows;
}

function assertColumnLength(table: TableSnapshot, values: readonly string[]): void {
  if (table.columns.length > 0 && values.length !== rowCount(table)) {
    throw new Error(
      `Column has ${String(values.length)} values but the table has ${String(rowCount(table))} rows`,
    );
  }
}
