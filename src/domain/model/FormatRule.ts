import type { DateTemplate } from '../services/DateTemplate.js';

interface FormatRuleBase {
  /** Unique rule name, reported in decision logs. */
  readonly name: string;
  readonly description: string;
  /** Recognition predicate. Always evaluated as a full-string match. */
  readonly pattern: RegExp;
}

/** Decodes positional date/time components described by a strftime-style template. */
export interface TemplateFormatRule extends FormatRuleBase {
  readonly kind: 'template';
  readonly template: DateTemplate;
}

/** Decodes a spreadsheet serial day count. */
export interface SerialFormatRule extends FormatRuleBase {
  readonly kind: 'serial';
}

/** A recognition/decoding rule. Its priority is its position in the `FormatRegistry`. */
export type FormatRule = TemplateFormatRule | SerialFormatRule;

/** Public description of a rule, as listed by `FormatRegistry.describe()`. */
export interface FormatRuleInfo {
  readonly name: string;
  readonly kind: FormatRule['kind'];
  readonly description: string;
}

/** Wrap a user pattern so that `test()` only succeeds on a full-string match. */
export function fullMatchPattern(source: string): RegExp {
  return new RegExp(`^(?:${source})$`);
}

/** Whether `value` fully matches the rule's recognition predicate. */
export function ruleMatches(rule: FormatRule, value: string): boolean {
  return rule.pattern.test(value);
}
