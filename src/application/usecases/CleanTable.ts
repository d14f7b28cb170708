import type { TableSnapshot } from '../../domain/model/TableSnapshot.js';
import type { ValueDecision } from '../../domain/model/ValueDecision.js';
import type { TableCleaningSummary } from '../../domain/model/CleaningSummary.js';
import type { FieldSpec } from '../../domain/model/FieldSpec.js';
import { emptySummary } from '../../domain/model/CleaningSummary.js';
import { OutputMode, derivedColumnName } from '../../domain/model/CleaningPolicy.js';
import { columnNames, columnValues, dropRows, replaceColumn, rowCount, upsertColumn } from '../../domain/model/TableSnapshot.js';
import type { ColumnLookup } from '../../domain/services/FieldAliasResolver.js';
import type { RowDropSet } from '../../domain/services/CleaningPolicyEngine.js';
import type { CleaningContext } from '../CleaningContext.js';

export interface TableCleaningResult {
  readonly table: TableSnapshot;
  readonly decisions: readonly ValueDecision[];
  readonly summary: TableCleaningSummary;
}

interface Counters {
  normalizedValues: number;
  unparsableValues: number;
  emptyValues: number;
}

/** Use case: clean every configured date field of one in-memory table. */
export class CleanTable {
  constructor(private readonly ctx: CleaningContext) {}

  /** @param source File the table was read from. Used in logs and events only. */
  execute(table: TableSnapshot, source?: string): TableCleaningResult {
    const rows = rowCount(table);
    if (!this.ctx.config.enabled) {
      this.ctx.logger.info({ source }, 'Date cleaning is disabled; table left unchanged');
      return { table, decisions: [], summary: emptySummary(rows) };
    }

    const lookup = this.ctx.resolver.createLookup(columnNames(table));
    this.warnDuplicates(lookup, source);

    const drops: RowDropSet = new Set();
    const decisions: ValueDecision[] = [];
    const resolvedFields: string[] = [];
    const unresolvedFields: string[] = [];
    const counters: Counters = { normalizedValues: 0, unparsableValues: 0, emptyValues: 0 };
    let current = table;

    for (const field of this.ctx.fields) {
      const index = lookup.resolve(field);
      if (index === null) {
        unresolvedFields.push(field.name);
        this.ctx.logger.info({ field: field.name, source }, 'No column matches date field; skipped');
        this.ctx.eventBus.emit({ type: 'field:unresolved', field: field.name, source, timestamp: Date.now() });
        continue;
      }

      resolvedFields.push(field.name);
      const fieldDecisions = this.cleanField(field, index, current, drops);
      current = fieldDecisions.table;
      decisions.push(...fieldDecisions.decisions);
      this.count(fieldDecisions.decisions, counters);
    }

    const cleaned = dropRows(current, drops);
    const summary: TableCleaningSummary = {
      rows,
      droppedRows: drops.size,
      resolvedFields,
      unresolvedFields,
      ...counters,
    };

    this.ctx.logger.info({ source, ...summary }, 'Table cleaned');
    this.ctx.eventBus.emit({ type: 'table:cleaned', source, summary, timestamp: Date.now() });

    return { table: cleaned, decisions, summary };
  }

  private cleanField(
    field: FieldSpec,
    index: number,
    table: TableSnapshot,
    drops: RowDropSet,
  ): { table: TableSnapshot; decisions: ValueDecision[] } {
    const column = table.columns[index]?.name ?? field.name;
    const values = columnValues(table, index);
    const groups = this.ctx.normalizer.normalizeColumn(values, field);
    const applied = this.ctx.policy.applyToColumn(values, groups, { field: field.name, column }, drops);

    if (this.ctx.config.options.logDetails) {
      for (const decision of applied.decisions) {
        this.ctx.logger.info(
          {
            field: decision.field,
            column: decision.column,
            raw: decision.raw,
            rule: decision.rule ?? 'none',
            action: decision.action,
            output: decision.output,
            rows: decision.rows.length,
          },
          'Date value decision',
        );
      }
    }

    const updated =
      this.ctx.config.options.outputMode === OutputMode.ADD_COLUMN
        ? upsertColumn(table, derivedColumnName(column), applied.values)
        : replaceColumn(table, index, applied.values);

    return { table: updated, decisions: applied.decisions };
  }

  private count(decisions: readonly ValueDecision[], counters: Counters): void {
    for (const decision of decisions) {
      switch (decision.action) {
        case 'normalized':
          counters.normalizedValues += decision.rows.length;
          break;
        case 'empty':
          counters.emptyValues += decision.rows.length;
          break;
        case 'kept_original':
        case 'set_null':
        case 'drop_row':
          counters.unparsableValues += decision.rows.length;
          break;
      }
    }
  }

  private warnDuplicates(lookup: ColumnLookup, source: string | undefined): void {
    for (const duplicate of lookup.duplicates) {
      this.ctx.logger.warn(
        {
          source,
          key: duplicate.key,
          kept: lookup.columns[duplicate.kept],
          ignored: lookup.columns[duplicate.ignored],
          keptIndex: duplicate.kept,
          ignoredIndex: duplicate.ignored,
        },
        'Duplicate column name after normalisation; first occurrence wins',
      );
    }
  }
}
