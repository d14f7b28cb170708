import type { ValueDecision, DecisionAction } from '../model/ValueDecision.js';
import { CleaningPolicy } from '../model/CleaningPolicy.js';
import type { ValueGroup } from './DateNormalizer.js';

/** Rows scheduled for removal once every field has been evaluated. */
export type RowDropSet = Set<number>;

export interface ColumnContext {
  readonly field: string;
  readonly column: string;
}

export interface PolicyApplication {
  readonly values: string[];
  readonly decisions: ValueDecision[];
}

/** Applies the run-wide failure policy to values no rule could decode. */
export class CleaningPolicyEngine {
  constructor(readonly policy: CleaningPolicy) {}

  /**
   * Build the cleaned column for `values` from its normalisation groups.
   * `DROP_ROW` leaves the cells untouched and adds their rows to `drops`.
   */
  applyToColumn(
    values: readonly string[],
    groups: readonly ValueGroup[],
    context: ColumnContext,
    drops: RowDropSet,
  ): PolicyApplication {
    const cleaned = [...values];
    const decisions: ValueDecision[] = [];

    for (const group of groups) {
      const { action, output } = this.decide(group);

      if (action === 'drop_row') {
        for (const row of group.rows) drops.add(row);
      } else if (output !== null) {
        for (const row of group.rows) cleaned[row] = output;
      }

      decisions.push({
        field: context.field,
        column: context.column,
        raw: group.raw,
        rule: group.rule,
        action,
        output,
        rows: group.rows,
      });
    }

    return { values: cleaned, decisions };
  }

  private decide(group: ValueGroup): { action: DecisionAction; output: string | null } {
    if (group.empty) {
      return { action: 'empty', output: group.raw };
    }
    if (group.output !== null) {
      return { action: 'normalized', output: group.output };
    }

    switch (this.policy) {
      case CleaningPolicy.KEEP_ORIGINAL:
        return { action: 'kept_original', output: group.raw };
      case CleaningPolicy.SET_NULL:
        return { action: 'set_null', output: '' };
      case CleaningPolicy.DROP_ROW:
        return { action: 'drop_row', output: null };
    }
  }
}
