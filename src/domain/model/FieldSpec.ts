/** A logical date field and the column names that may carry it. */
export interface FieldSpec {
  /** Canonical field name. Always tried first when resolving a column. */
  readonly name: string;
  /** Alternative column names, tried in declared order after `name`. */
  readonly aliases: readonly string[];
  /** When `true`, output uses the full date-time template; otherwise the date-only one. */
  readonly hasTime: boolean;
}

/** Create a frozen field spec. Aliases equal to the canonical name are dropped. */
export function createFieldSpec(name: string, aliases: readonly string[] = [], hasTime = true): FieldSpec {
  return Object.freeze({
    name,
    aliases: Object.freeze(aliases.filter((alias) => alias !== name)),
    hasTime,
  });
}

/** Candidate column names for a field: the canonical name first, then each alias. */
export function fieldCandidates(field: FieldSpec): readonly string[] {
  return [field.name, ...field.aliases.filter((alias) => alias !== field.name)];
}
