import type { FieldSpec } from '../model/FieldSpec.js';
import type { DecodedDateTime } from '../model/DecodedDateTime.js';
import { withMidnight, withoutTime } from '../model/DecodedDateTime.js';
import type { DateTemplate } from './DateTemplate.js';
import type { FormatRegistry, FormatMatch } from './FormatRegistry.js';

export interface DateNormalizerOptions {
  readonly registry: FormatRegistry;
  readonly outputFormat: DateTemplate;
  readonly outputFormatDateOnly: DateTemplate;
  readonly stripTrailingDecimalZero: boolean;
}

/** Normalisation result for one raw value. */
export interface NormalizedValue {
  readonly raw: string;
  /** The value after preprocessing, as handed to the registry. */
  readonly prepared: string;
  /** Blank after trimming. Blank values are never decoded. */
  readonly empty: boolean;
  /** Rule that decoded the value, or `null`. */
  readonly rule: string | null;
  /** Canonical rendering, or `null` when empty or unparsable. */
  readonly output: string | null;
}

/** A distinct raw value of a column and the rows that hold it. */
export interface ValueGroup extends NormalizedValue {
  readonly rows: readonly number[];
}

const SPACE_AFTER_SEPARATOR = /(?<=\d)([./])\s+(?=\d)/g;
const TRAILING_DECIMAL_ZERO = /^\d+\.0$/;

/** Rewrites raw date cells into the configured canonical representation. */
export class DateNormalizer {
  private readonly registry: FormatRegistry;
  private readonly outputFormat: DateTemplate;
  private readonly outputFormatDateOnly: DateTemplate;
  private readonly stripTrailingDecimalZero: boolean;

  constructor(options: DateNormalizerOptions) {
    this.registry = options.registry;
    this.outputFormat = options.outputFormat;
    this.outputFormatDateOnly = options.outputFormatDateOnly;
    this.stripTrailingDecimalZero = options.stripTrailingDecimalZero;
  }

  /** Trim, close up `2024. 1. 4` style spacing and, when enabled, drop a trailing `.0` from integers. */
  prepare(raw: string): string {
    let value = raw.trim().replace(SPACE_AFTER_SEPARATOR, '$1');
    if (this.stripTrailingDecimalZero && TRAILING_DECIMAL_ZERO.test(value)) {
      value = value.slice(0, -2);
    }
    return value;
  }

  /** Render a decoded value with the template matching the field's `hasTime`. */
  render(value: DecodedDateTime, field: FieldSpec): string {
    if (field.hasTime) {
      return this.outputFormat.format(value.hasTime ? value : withMidnight(value));
    }
    return this.outputFormatDateOnly.format(withoutTime(value));
  }

  normalizeValue(raw: string, field: FieldSpec): NormalizedValue {
    const prepared = this.prepare(raw);
    const match = prepared === '' ? null : this.registry.resolve(prepared);
    return this.toNormalized(raw, prepared, match, field);
  }

  /**
   * Normalise a whole column. Rows are grouped by raw value and the distinct
   * preprocessed values are resolved together, so repeated values are decoded
   * once. Groups are returned in first-seen order.
   */
  normalizeColumn(values: readonly string[], field: FieldSpec): ValueGroup[] {
    const groups = new Map<string, { prepared: string; rows: number[] }>();
    values.forEach((raw, row) => {
      const group = groups.get(raw);
      if (group) {
        group.rows.push(row);
      } else {
        groups.set(raw, { prepared: this.prepare(raw), rows: [row] });
      }
    });

    const candidates = [...groups.values()].map((group) => group.prepared).filter((prepared) => prepared !== '');
    const matches = this.registry.resolveMany(candidates);

    return [...groups].map(([raw, group]) => ({
      ...this.toNormalized(raw, group.prepared, matches.get(group.prepared) ?? null, field),
      rows: group.rows,
    }));
  }

  private toNormalized(raw: string, prepared: string, match: FormatMatch | null, field: FieldSpec): NormalizedValue {
    if (prepared === '') {
      return { raw, prepared, empty: true, rule: null, output: null };
    }
    return {
      raw,
      prepared,
      empty: false,
      rule: match?.rule.name ?? null,
      output: match ? this.render(match.value, field) : null,
    };
  }
}
