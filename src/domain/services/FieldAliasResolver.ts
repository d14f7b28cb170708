import type { FieldSpec } from '../model/FieldSpec.js';
import { fieldCandidates } from '../model/FieldSpec.js';

/** A header name that normalised to the same key as an earlier column and was ignored. */
export interface DuplicateColumn {
  readonly key: string;
  /** Index of the column that owns the key. */
  readonly kept: number;
  readonly ignored: number;
}

/** Canonical comparison key for a column or alias name: BOM stripped, trimmed, lower-cased. */
export function normalizeColumnName(name: string): string {
  return name.replace(/^\uFEFF+/, '').trim().toLowerCase();
}

/** Normalised-name lookup over one table header. */
export class ColumnLookup {
  private readonly indexByKey = new Map<string, number>();
  private readonly duplicateColumns: DuplicateColumn[] = [];

  constructor(readonly columns: readonly string[]) {
    columns.forEach((column, index) => {
      const key = normalizeColumnName(column);
      const kept = this.indexByKey.get(key);
      if (kept === undefined) {
        this.indexByKey.set(key, index);
      } else {
        this.duplicateColumns.push({ key, kept, ignored: index });
      }
    });
  }

  get duplicates(): readonly DuplicateColumn[] {
    return this.duplicateColumns;
  }

  /** Index of the first column matching the field's name or one of its aliases, in declared order. */
  resolve(field: FieldSpec): number | null {
    for (const candidate of fieldCandidates(field)) {
      const index = this.indexByKey.get(normalizeColumnName(candidate));
      if (index !== undefined) return index;
    }
    return null;
  }
}

/**
 * Matches logical date fields to physical columns.
 *
 * Matching is exact after normalisation; there is no fuzzy or semantic
 * inference. When several columns normalise to the same key the first one
 * wins.
 */
export class FieldAliasResolver {
  createLookup(columns: readonly string[]): ColumnLookup {
    return new ColumnLookup(columns);
  }

  resolve(columns: readonly string[], field: FieldSpec): number | null {
    return this.createLookup(columns).resolve(field);
  }
}
