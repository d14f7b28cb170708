import { describe, it, expect } from 'vitest';
import {
  createTableSnapshot,
  columnNames,
  rowCount,
  columnValues,
  replaceColumn,
  upsertColumn,
  dropRows,
  toRows,
} from '../../../src/domain/model/TableSnapshot.js';

describe('TableSnapshot', () => {
  const table = createTableSnapshot(
    ['id', 'date'],
    [
      ['1', '2024-01-02'],
      ['2'],
      ['3', '45118', 'extra'],
    ],
  );

  it('should pad short rows and truncate long ones', () => {
    expect(toRows(table)).toEqual([
      ['1', '2024-01-02'],
      ['2', ''],
      ['3', '45118'],
    ]);
  });

  it('should expose names and row count', () => {
    expect(columnNames(table)).toEqual(['id', 'date']);
    expect(rowCount(table)).toBe(3);
    expect(rowCount(createTableSnapshot([], []))).toBe(0);
  });

  it('should throw for a missing column', () => {
    expect(() => columnValues(table, 5)).toThrow(/does not exist/);
  });

  it('should replace a column in place without mutating the original', () => {
    const replaced = replaceColumn(table, 1, ['a', 'b', 'c']);

    expect(columnValues(replaced, 1)).toEqual(['a', 'b', 'c']);
    expect(columnValues(table, 1)).toEqual(['2024-01-02', '', '45118']);
  });

  it('should reject a column of the wrong length', () => {
    expect(() => replaceColumn(table, 1, ['a'])).toThrow(/1 values but the table has 3 rows/);
  });

  it('should append a new column or overwrite an existing one by name', () => {
    const appended = upsertColumn(table, 'date_cleaned', ['x', 'y', 'z']);
    const overwritten = upsertColumn(appended, 'date_cleaned', ['p', 'q', 'r']);

    expect(columnNames(appended)).toEqual(['id', 'date', 'date_cleaned']);
    expect(columnNames(overwritten)).toEqual(['id', 'date', 'date_cleaned']);
    expect(columnValues(overwritten, 2)).toEqual(['p', 'q', 'r']);
  });

  it('should drop rows keeping order', () => {
    expect(toRows(dropRows(table, new Set([1])))).toEqual([
      ['1', '2024-01-02'],
      ['3', '45118'],
    ]);
  });

  it('should keep duplicate column names distinct', () => {
    const duplicated = createTableSnapshot(['time', 'time'], [['a', 'b']]);

    expect(columnValues(replaceColumn(duplicated, 1, ['c']), 0)).toEqual(['a']);
  });

  it('should carry the source delimiter through every derived table', () => {
    const table = { ...createTableSnapshot(['a', 'b'], [['1', '2'], ['3', '4']]), delimiter: ';' };

    expect(replaceColumn(table, 0, ['x', 'y']).delimiter).toBe(';');
    expect(upsertColumn(table, 'c', ['5', '6']).delimiter).toBe(';');
    expect(dropRows(table, new Set([0])).delimiter).toBe(';');
  });
});
