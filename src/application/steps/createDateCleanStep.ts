import { access } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineStepSpec, StepContext } from '../../domain/model/PipelineStep.js';
import type { DateCleaner } from '../../DateCleaner.js';

export const DATE_CLEAN_STEP_ID = 'date_clean';

/** Output of the merge step. */
export const MERGED_FILE = 'merge.csv';
/** Output of the field-cleaning step, and of this step. */
export const CLEANED_FILE = 'merge_cleaned.csv';

export interface DateCleanStepOptions {
  readonly cleaner: DateCleaner;
  /** Directory holding the pipeline's intermediate tables. */
  readonly resultDir: string;
  /** Canonical names of the fields to clean. Default: every configured field. */
  readonly fields?: readonly string[];
  /** Default: `false`. */
  readonly required?: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pipeline step that date-cleans the merged table in place.
 *
 * Reads `merge_cleaned.csv` when an earlier step produced it, otherwise
 * `merge.csv`, and always writes `merge_cleaned.csv`.
 */
export function createDateCleanStep(options: DateCleanStepOptions): PipelineStepSpec {
  const cleaner = options.fields ? options.cleaner.withFields(options.fields) : options.cleaner;

  return {
    id: DATE_CLEAN_STEP_ID,
    label: 'Date cleaning',
    required: options.required ?? false,
    async run({ logger }: StepContext): Promise<void> {
      if (!cleaner.enabled) {
        logger.info('Date cleaning is disabled; step skipped');
        return;
      }

      const cleanedPath = join(options.resultDir, CLEANED_FILE);
      const mergedPath = join(options.resultDir, MERGED_FILE);
      const input = (await exists(cleanedPath)) ? cleanedPath : (await exists(mergedPath)) ? mergedPath : null;

      if (input === null) {
        logger.warn({ resultDir: options.resultDir }, `Neither ${CLEANED_FILE} nor ${MERGED_FILE} found; nothing to clean`);
        return;
      }

      const { summary } = await cleaner.cleanFile(input, cleanedPath);
      logger.info({ input, output: cleanedPath, ...summary }, 'Date cleaning step finished');
    },
  };
}
