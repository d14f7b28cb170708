import { basename, join } from 'node:path';
import { FileFailureError, errorMessage } from '../../domain/errors/CleaningErrors.js';
import type { CleaningContext } from '../CleaningContext.js';
import type { FileCleaningResult } from './CleanFile.js';
import { CleanFile } from './CleanFile.js';

export interface CleanFilesOptions {
  /** Once aborted, no further file is started. Files already in flight finish. */
  readonly signal?: AbortSignal;
}

/** One input file and the path its cleaned copy is written to. */
export interface FileJob {
  readonly input: string;
  readonly output: string;
}

export interface CleanFilesResult {
  /** In completion order. */
  readonly completed: readonly FileCleaningResult[];
  readonly failed: readonly FileFailureError[];
  /** Inputs never started, because the batch was aborted or cleaning is disabled. */
  readonly skipped: readonly string[];
  readonly aborted: boolean;
}

/**
 * Use case: clean a set of files into `outputDir`, each written under its own
 * basename. A failing file is recorded and the rest of the batch continues.
 */
export class CleanFiles {
  constructor(private readonly ctx: CleaningContext) {}

  async execute(inputs: readonly string[], outputDir: string, options?: CleanFilesOptions): Promise<CleanFilesResult> {
    return this.executeJobs(
      inputs.map((input) => ({ input, output: join(outputDir, basename(input)) })),
      options,
    );
  }

  /** Clean each job's input into its own output path. */
  async executeJobs(jobs: readonly FileJob[], options?: CleanFilesOptions): Promise<CleanFilesResult> {
    const completed: FileCleaningResult[] = [];
    const failed: FileFailureError[] = [];
    const skipped: string[] = [];
    const signal = options?.signal;

    if (!this.ctx.config.enabled) {
      this.ctx.logger.info({ files: jobs.length }, 'Date cleaning is disabled; no file processed');
      return { completed, failed, skipped: jobs.map((job) => job.input), aborted: false };
    }

    const maxConcurrency = Math.max(1, this.ctx.maxConcurrentFiles);
    const activeFiles = new Set<Promise<void>>();

    for (const { input, output } of jobs) {
      while (activeFiles.size >= maxConcurrency) {
        await Promise.race(activeFiles);
      }
      if (signal?.aborted) {
        skipped.push(input);
        continue;
      }

      const filePromise: Promise<void> = this.cleanOne(input, output, completed, failed).then(() => {
        activeFiles.delete(filePromise);
      });
      activeFiles.add(filePromise);
    }

    await Promise.all([...activeFiles]);

    const aborted = signal?.aborted ?? false;
    this.ctx.logger.info(
      { completed: completed.length, failed: failed.length, skipped: skipped.length, aborted },
      'File batch finished',
    );
    return { completed, failed, skipped, aborted };
  }

  private async cleanOne(
    input: string,
    output: string,
    completed: FileCleaningResult[],
    failed: FileFailureError[],
  ): Promise<void> {
    try {
      completed.push(await new CleanFile(this.ctx).execute(input, output));
    } catch (error) {
      const failure = new FileFailureError(input, error);
      failed.push(failure);
      this.ctx.logger.error({ err: error, input }, 'Failed to clean file');
      this.ctx.eventBus.emit({ type: 'file:failed', input, error: errorMessage(error), timestamp: Date.now() });
    }
  }
}
