import type { ValueDecision } from '../../domain/model/ValueDecision.js';
import type { TableCleaningSummary } from '../../domain/model/CleaningSummary.js';
import type { CleaningContext } from '../CleaningContext.js';
import { CleanTable } from './CleanTable.js';

export interface FileCleaningResult {
  readonly input: string;
  readonly output: string;
  readonly summary: TableCleaningSummary;
  readonly decisions: readonly ValueDecision[];
}

/** Use case: read one table, clean it and write it back atomically. Errors propagate. */
export class CleanFile {
  constructor(private readonly ctx: CleaningContext) {}

  async execute(input: string, output: string): Promise<FileCleaningResult> {
    this.ctx.eventBus.emit({ type: 'file:started', input, output, timestamp: Date.now() });
    this.ctx.logger.debug({ input, output }, 'Cleaning file');

    const table = await this.ctx.codec.read(input);
    const { table: cleaned, summary, decisions } = new CleanTable(this.ctx).execute(table, input);
    await this.ctx.codec.write(output, cleaned);

    this.ctx.eventBus.emit({ type: 'file:completed', input, output, summary, timestamp: Date.now() });
    return { input, output, summary, decisions };
  }
}
