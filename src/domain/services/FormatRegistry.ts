import type { DecodedDateTime } from '../model/DecodedDateTime.js';
import type { FormatRule, FormatRuleInfo } from '../model/FormatRule.js';
import { fullMatchPattern, ruleMatches } from '../model/FormatRule.js';
import { DecodeFailureMode } from '../model/CleaningPolicy.js';
import { ConfigError, errorMessage } from '../errors/CleaningErrors.js';
import { DateTemplate } from './DateTemplate.js';
import { decodeSerialDate } from './SerialDate.js';

/** Declarative rule definition, as written in the `parseFormats` configuration list. */
export interface FormatRuleDefinition {
  readonly name: string;
  /** strftime-style template. `null` for serial rules. */
  readonly templatePattern: string | null;
  readonly recognitionPattern: string;
  readonly isSerialNumeric: boolean;
  readonly description?: string;
}

/** The rule that recognised and decoded a value, with the decoded components. */
export interface FormatMatch {
  readonly rule: FormatRule;
  readonly value: DecodedDateTime;
}

export interface FormatRegistryOptions {
  /** Default: `'fallthrough'`. */
  readonly onDecodeFailure?: DecodeFailureMode;
}

/** Build a rule from its definition. Template and pattern errors propagate as thrown. */
export function createFormatRule(definition: FormatRuleDefinition): FormatRule {
  const base = {
    name: definition.name,
    description: definition.description ?? '',
    pattern: fullMatchPattern(definition.recognitionPattern),
  };

  if (definition.isSerialNumeric) {
    return Object.freeze({ ...base, kind: 'serial' as const });
  }
  if (definition.templatePattern === null) {
    throw new ConfigError(`Rule '${definition.name}' needs a templatePattern unless it is serial-numeric`);
  }
  return Object.freeze({ ...base, kind: 'template' as const, template: DateTemplate.compile(definition.templatePattern) });
}

function createRuleAt(definition: FormatRuleDefinition, path: string): FormatRule {
  try {
    return createFormatRule(definition);
  } catch (error) {
    throw new ConfigError(`Invalid format rule '${definition.name}': ${errorMessage(error)}`, path, { cause: error });
  }
}

function decodeWith(rule: FormatRule, value: string): DecodedDateTime | null {
  switch (rule.kind) {
    case 'serial':
      return decodeSerialDate(value);
    case 'template':
      return rule.template.parse(value);
  }
}

/**
 * Ordered, immutable set of recognition/decoding rules.
 *
 * A value is decoded by the first rule whose predicate fully matches it and
 * whose decoder accepts it. When a predicate matches but the decoder rejects
 * the value (Feb 30, month 13) the search continues with the next rule, or
 * stops when the registry was built with `onDecodeFailure: 'fail'`.
 *
 * @example
 * ```typescript
 * const registry = FormatRegistry.fromConfig([
 *   { name: 'compact', templatePattern: '%Y%m%d', recognitionPattern: '\\d{8}', isSerialNumeric: false },
 * ]);
 * registry.resolve('20240102')?.rule.name; // 'compact'
 * ```
 */
export class FormatRegistry {
  readonly rules: readonly FormatRule[];
  readonly onDecodeFailure: DecodeFailureMode;

  constructor(rules: readonly FormatRule[], options?: FormatRegistryOptions) {
    const names = new Set<string>();
    for (const rule of rules) {
      if (names.has(rule.name)) {
        throw new ConfigError(`Duplicate format rule name '${rule.name}'`);
      }
      names.add(rule.name);
    }

    this.rules = Object.freeze([...rules]);
    this.onDecodeFailure = options?.onDecodeFailure ?? DecodeFailureMode.FALLTHROUGH;
  }

  static fromConfig(definitions: readonly FormatRuleDefinition[], options?: FormatRegistryOptions): FormatRegistry {
    return new FormatRegistry(definitions.map(createFormatRule), options);
  }

  get size(): number {
    return this.rules.length;
  }

  /** Decode a single (already preprocessed) value. `null` when no rule both matches and decodes it. */
  resolve(value: string): FormatMatch | null {
    return this.resolveMany([value]).get(value) ?? null;
  }

  /**
   * Decode a set of values rule by rule.
   *
   * Each rule's predicate is evaluated once over the distinct values still
   * unresolved, so a column with many repeated values costs one pass per rule.
   * The returned map has an entry (possibly `null`) for every distinct input.
   */
  resolveMany(values: Iterable<string>): Map<string, FormatMatch | null> {
    const results = new Map<string, FormatMatch | null>();
    let remaining = [...new Set(values)];

    for (const rule of this.rules) {
      if (remaining.length === 0) break;
      const unresolved: string[] = [];

      for (const value of remaining) {
        if (!ruleMatches(rule, value)) {
          unresolved.push(value);
          continue;
        }

        const decoded = decodeWith(rule, value);
        if (decoded) {
          results.set(value, { rule, value: decoded });
        } else if (this.onDecodeFailure === DecodeFailureMode.FAIL) {
          results.set(value, null);
        } else {
          unresolved.push(value);
        }
      }

      remaining = unresolved;
    }

    for (const value of remaining) {
      results.set(value, null);
    }

    return results;
  }

  /**
   * A new registry with `rules` appended after the existing ones. This registry is left untouched.
   * A definition that does not compile throws `ConfigError` with path `rules[i]`.
   */
  extend(rules: readonly (FormatRule | FormatRuleDefinition)[]): FormatRegistry {
    const extra = rules.map((rule, index) =>
      'kind' in rule ? rule : createRuleAt(rule, `rules[${String(index)}]`),
    );
    return new FormatRegistry([...this.rules, ...extra], { onDecodeFailure: this.onDecodeFailure });
  }

  /** A new registry with the same rules and a different decode-failure mode. */
  withDecodeFailure(mode: DecodeFailureMode): FormatRegistry {
    return new FormatRegistry(this.rules, { onDecodeFailure: mode });
  }

  describe(): FormatRuleInfo[] {
    return this.rules.map((rule) => ({ name: rule.name, kind: rule.kind, description: rule.description }));
  }
}
