import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from 'pino';
import type { CleaningConfig } from './domain/model/CleaningConfig.js';
import type { FieldSpec } from './domain/model/FieldSpec.js';
import type { FormatRuleInfo } from './domain/model/FormatRule.js';
import type { TableSnapshot } from './domain/model/TableSnapshot.js';
import type { TableCodec } from './domain/ports/TableCodec.js';
import type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
import { EventBus } from './application/EventBus.js';
import { CleaningContext } from './application/CleaningContext.js';
import { CleanTable } from './application/usecases/CleanTable.js';
import type { TableCleaningResult } from './application/usecases/CleanTable.js';
import { CleanFile } from './application/usecases/CleanFile.js';
import type { FileCleaningResult } from './application/usecases/CleanFile.js';
import { CleanFiles } from './application/usecases/CleanFiles.js';
import type { CleanFilesOptions, CleanFilesResult } from './application/usecases/CleanFiles.js';
import { CsvTableCodec } from './infrastructure/codecs/CsvTableCodec.js';
import { loadCleaningConfig } from './infrastructure/config/loadCleaningConfig.js';
import { createLogger } from './infrastructure/logging/logger.js';

export interface DateCleanerOptions {
  /** Default: `CsvTableCodec` with delimiter detection. */
  readonly codec?: TableCodec;
  readonly logger?: Logger;
  /** Files cleaned at once by `cleanFiles`/`cleanDirectory`. Default: `1`. */
  readonly maxConcurrentFiles?: number;
  /** Share an event bus between cleaners, e.g. with a `PipelineSequencer`. */
  readonly eventBus?: EventBus;
  /** Clean only the configured fields with these canonical names. */
  readonly fields?: readonly string[];
}

const CSV_EXTENSION = '.csv';

/**
 * Entry point for date cleaning: one configuration, applied to tables, files
 * and directories.
 *
 * @example
 * ```typescript
 * const cleaner = await DateCleaner.fromConfigFile('config/date-formats.json');
 * cleaner.on('file:failed', (e) => console.error(e.input, e.error));
 * const result = await cleaner.cleanDirectory('exports', 'cleaned');
 * ```
 */
export class DateCleaner {
  private readonly ctx: CleaningContext;
  private readonly options: DateCleanerOptions;

  constructor(
    readonly config: CleaningConfig,
    options?: DateCleanerOptions,
  ) {
    this.options = options ?? {};
    const maxConcurrentFiles = this.options.maxConcurrentFiles ?? 1;
    if (!Number.isInteger(maxConcurrentFiles) || maxConcurrentFiles < 1) {
      throw new Error(`maxConcurrentFiles must be a positive integer, got ${String(maxConcurrentFiles)}`);
    }
    const logger = this.options.logger ?? createLogger('date-cleaner');
    const context = new CleaningContext(
      config,
      config.dateFields,
      this.options.codec ?? new CsvTableCodec(),
      this.options.eventBus ?? new EventBus(logger),
      logger,
      maxConcurrentFiles,
    );
    this.ctx = this.options.fields ? context.restrictTo(this.options.fields) : context;
  }

  /** Load, validate and apply a JSON configuration file. Throws `ConfigError`. */
  static async fromConfigFile(path?: string, options?: DateCleanerOptions): Promise<DateCleaner> {
    return new DateCleaner(await loadCleaningConfig(path), options);
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /** Fields this cleaner processes, in configuration order. */
  get fields(): readonly FieldSpec[] {
    return this.ctx.fields;
  }

  get eventBus(): EventBus {
    return this.ctx.eventBus;
  }

  /** A cleaner for a subset of the configured fields, sharing registry, codec and event bus. */
  withFields(names: readonly string[]): DateCleaner {
    return new DateCleaner(this.config, { ...this.options, eventBus: this.ctx.eventBus, logger: this.ctx.logger, fields: names });
  }

  describeFormats(): FormatRuleInfo[] {
    return this.config.registry.describe();
  }

  cleanTable(table: TableSnapshot, source?: string): TableCleaningResult {
    return new CleanTable(this.ctx).execute(table, source);
  }

  /** Clean one file. Read, decode and write errors propagate. */
  async cleanFile(input: string, output: string): Promise<FileCleaningResult> {
    return new CleanFile(this.ctx).execute(input, output);
  }

  /** Clean each input into `outputDir` under its own basename. Per-file failures are collected, not thrown. */
  async cleanFiles(inputs: readonly string[], outputDir: string, options?: CleanFilesOptions): Promise<CleanFilesResult> {
    return new CleanFiles(this.ctx).execute(inputs, outputDir, options);
  }

  /** Clean every `*.csv` file directly inside `inputDir`, in name order. */
  async cleanDirectory(inputDir: string, outputDir: string, options?: CleanFilesOptions): Promise<CleanFilesResult> {
    const entries = await readdir(inputDir, { withFileTypes: true });
    const inputs = entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(CSV_EXTENSION))
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(inputDir, name));

    if (inputs.length === 0) {
      this.ctx.logger.warn({ inputDir }, 'No CSV files found');
    }
    return this.cleanFiles(inputs, outputDir, options);
  }

  /**
   * Clean a file or a directory. A directory input is cleaned into the
   * `output` directory. A file input is written to `output`, or into it when
   * `output` is an existing directory.
   */
  async cleanPath(input: string, output: string, options?: CleanFilesOptions): Promise<CleanFilesResult> {
    const inputStats = await stat(input);
    if (inputStats.isDirectory()) {
      return this.cleanDirectory(input, output, options);
    }

    const target = (await isDirectory(output)) ? join(output, basename(input)) : output;
    return new CleanFiles(this.ctx).executeJobs([{ input, output: target }], options);
  }

  /** Subscribe to a domain event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe from a domain event. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every domain event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}
