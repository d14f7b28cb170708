import type { FieldSpec } from './FieldSpec.js';
import type { CleaningOptions } from './CleaningPolicy.js';
import type { DateTemplate } from '../services/DateTemplate.js';
import type { FormatRegistry } from '../services/FormatRegistry.js';

/** Validated, immutable configuration for one run. Built by `parseCleaningConfig`. */
export interface CleaningConfig {
  readonly enabled: boolean;
  /** Canonical output for fields with `hasTime: true`. */
  readonly outputFormat: DateTemplate;
  /** Canonical output for fields with `hasTime: false`. */
  readonly outputFormatDateOnly: DateTemplate;
  readonly dateFields: readonly FieldSpec[];
  readonly registry: FormatRegistry;
  readonly options: CleaningOptions;
}
