/** Outcome applied to a value that no format rule can decode. Global per run. */
export const CleaningPolicy = {
  KEEP_ORIGINAL: 'keep_original',
  SET_NULL: 'set_null',
  DROP_ROW: 'drop_row',
} as const;

export type CleaningPolicy = (typeof CleaningPolicy)[keyof typeof CleaningPolicy];

/** Where normalised values are written. */
export const OutputMode = {
  /** Overwrite the resolved column in place. */
  REPLACE: 'replace',
  /** Append `<column>_cleaned`, leaving the original column untouched. */
  ADD_COLUMN: 'add_column',
} as const;

export type OutputMode = (typeof OutputMode)[keyof typeof OutputMode];

/** What happens when a rule's predicate matches but its decoder rejects the value. */
export const DecodeFailureMode = {
  /** Advance to the next rule in priority order. */
  FALLTHROUGH: 'fallthrough',
  /** Stop searching: the value is unparsable. */
  FAIL: 'fail',
} as const;

export type DecodeFailureMode = (typeof DecodeFailureMode)[keyof typeof DecodeFailureMode];

export const DERIVED_COLUMN_SUFFIX = '_cleaned';

export function derivedColumnName(column: string): string {
  return `${column}${DERIVED_COLUMN_SUFFIX}`;
}

/** Run-wide cleaning options. */
export interface CleaningOptions {
  readonly onParseFailure: CleaningPolicy;
  /** Strip a trailing `.0` from purely numeric values before classification. */
  readonly stripTrailingDecimalZero: boolean;
  /** Log every per-value decision. */
  readonly logDetails: boolean;
  readonly outputMode: OutputMode;
  readonly onDecodeFailure: DecodeFailureMode;
}
