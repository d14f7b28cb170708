/** What was done with one distinct raw value of a field. */
export type DecisionAction = 'normalized' | 'kept_original' | 'set_null' | 'drop_row' | 'empty';

/** Decision log entry. One per distinct raw value per resolved field. */
export interface ValueDecision {
  /** Canonical field name. */
  readonly field: string;
  /** Name of the column the field resolved to. */
  readonly column: string;
  readonly raw: string;
  /** Name of the rule that decoded the value, or `null` when none did. */
  readonly rule: string | null;
  readonly action: DecisionAction;
  /** Value written to the output cell. `null` when the row was dropped. */
  readonly output: string | null;
  /** Zero-based row indices holding this raw value, in input order. */
  readonly rows: readonly number[];
}
