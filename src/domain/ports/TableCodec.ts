import type { TableSnapshot } from '../model/TableSnapshot.js';

/** Reads and writes tables at a filesystem path. */
export interface TableCodec {
  read(path: string): Promise<TableSnapshot>;
  /** Must not leave a partially written file at `path` when it fails. */
  write(path: string, table: TableSnapshot): Promise<void>;
}
