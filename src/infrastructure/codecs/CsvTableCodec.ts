import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import Papa from 'papaparse';
import type { TableCodec } from '../../domain/ports/TableCodec.js';
import type { TableSnapshot } from '../../domain/model/TableSnapshot.js';
import { columnNames, createTableSnapshot, toRows } from '../../domain/model/TableSnapshot.js';

export interface CsvTableCodecOptions {
  /** Auto-detected when omitted. */
  readonly delimiter?: string;
}

/**
 * CSV adapter for the `TableCodec` port.
 *
 * The first record is the header. Every cell stays a string; rows shorter
 * than the header are padded with `''`, longer rows are truncated. Blank lines
 * are rows of blank cells, except the one a final newline leaves behind.
 * Output uses `\n` line endings, quotes only where needed, and the delimiter
 * the table was read with unless one is configured.
 */
export class CsvTableCodec implements TableCodec {
  private readonly delimiter: string | undefined;

  constructor(options?: CsvTableCodecOptions) {
    this.delimiter = options?.delimiter;
  }

  async read(path: string): Promise<TableSnapshot> {
    return this.parse(await readFile(path, 'utf-8'));
  }

  async write(path: string, table: TableSnapshot): Promise<void> {
    const directory = dirname(path);
    await mkdir(directory, { recursive: true });

    const tempPath = join(directory, `.${basename(path)}.${randomUUID()}.tmp`);
    try {
      await writeFile(tempPath, this.serialize(table), 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  parse(content: string): TableSnapshot {
    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.delimiter,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    const records = result.data;
    const last = records[records.length - 1];
    if (last && last.length === 1 && last[0] === '') {
      records.pop();
    }

    const [header = [], ...rows] = records;
    const table = createTableSnapshot(header, rows);
    const delimiter = result.meta.delimiter;
    return typeof delimiter === 'string' && delimiter !== '' ? { ...table, delimiter } : table;
  }

  serialize(table: TableSnapshot): string {
    if (table.columns.length === 0) return '';
    const csv = Papa.unparse([columnNames(table), ...toRows(table)], {
      newline: '\n',
      delimiter: this.delimiter ?? table.delimiter ?? ',',
    });
    return `${csv}\n`;
  }
}
