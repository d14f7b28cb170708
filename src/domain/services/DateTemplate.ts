import type { DecodedDateTime } from '../model/DecodedDateTime.js';
import { isValidDateTime } from '../model/DecodedDateTime.js';
import { TemplateSyntaxError } from '../errors/CleaningErrors.js';

/** strftime directives understood by the template compiler. */
export type TemplateDirective = 'Y' | 'y' | 'm' | 'd' | 'H' | 'M' | 'S';

export type TemplateToken =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'directive'; readonly directive: TemplateDirective };

const DIRECTIVE_PATTERNS: Record<TemplateDirective, string> = {
  Y: '(\\d{4})',
  y: '(\\d{2})',
  m: '(\\d{1,2})',
  d: '(\\d{1,2})',
  H: '(\\d{1,2})',
  M: '(\\d{1,2})',
  S: '(\\d{1,2})',
};

const TIME_DIRECTIVES: ReadonlySet<TemplateDirective> = new Set(['H', 'M', 'S']);

function isDirective(char: string): char is TemplateDirective {
  return char in DIRECTIVE_PATTERNS;
}

function escapeLiteral(text: string): string {
  return text
    .split(/(\s+)/)
    .map((part) => (/^\s+$/.test(part) ? '\\s+' : part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')))
    .join('');
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * A compiled strftime-style template (`%Y-%m-%d %H:%M:%S`, `%Y年%m月%d日`).
 *
 * The same template both decodes (`parse`) and renders (`format`). Decoding
 * follows strptime rules: `%m %d %H %M %S` accept one or two digits, whitespace
 * in the template matches any run of whitespace, and components the template
 * does not mention default to their first valid value.
 */
export class DateTemplate {
  readonly hasTime: boolean;
  private readonly regex: RegExp;
  private readonly directives: readonly TemplateDirective[];

  private constructor(
    readonly source: string,
    readonly tokens: readonly TemplateToken[],
  ) {
    this.directives = tokens.flatMap((token) => (token.kind === 'directive' ? [token.directive] : []));
    this.hasTime = this.directives.some((directive) => TIME_DIRECTIVES.has(directive));
    const body = tokens
      .map((token) => (token.kind === 'directive' ? DIRECTIVE_PATTERNS[token.directive] : escapeLiteral(token.text)))
      .join('');
    this.regex = new RegExp(`^${body}$`);
  }

  /** @throws TemplateSyntaxError on an unknown or repeated directive, or a trailing `%`. */
  static compile(source: string): DateTemplate {
    return new DateTemplate(source, tokenize(source));
  }

  /** Decode a value. Returns `null` when the shape does not match or a component is out of range. */
  parse(value: string): DecodedDateTime | null {
    const match = this.regex.exec(value);
    if (!match) return null;

    const components = { year: 1900, month: 1, day: 1, hour: 0, minute: 0, second: 0 };

    for (const [position, directive] of this.directives.entries()) {
      const text = match[position + 1];
      if (text === undefined) return null;
      const number = Number.parseInt(text, 10);

      switch (directive) {
        case 'Y':
          components.year = number;
          break;
        case 'y':
          components.year = number < 69 ? 2000 + number : 1900 + number;
          break;
        case 'm':
          components.month = number;
          break;
        case 'd':
          components.day = number;
          break;
        case 'H':
          components.hour = number;
          break;
        case 'M':
          components.minute = number;
          break;
        case 'S':
          components.second = number;
          break;
      }
    }

    const decoded: DecodedDateTime = { ...components, hasTime: this.hasTime };
    return isValidDateTime(decoded) ? decoded : null;
  }

  /** Render a value. Components the template does not mention are left out. */
  format(value: DecodedDateTime): string {
    return this.tokens
      .map((token) => {
        if (token.kind === 'literal') return token.text;
        switch (token.directive) {
          case 'Y':
            return pad(value.year, 4);
          case 'y':
            return pad(value.year % 100, 2);
          case 'm':
            return pad(value.month, 2);
          case 'd':
            return pad(value.day, 2);
          case 'H':
            return pad(value.hour, 2);
          case 'M':
            return pad(value.minute, 2);
          case 'S':
            return pad(value.second, 2);
        }
      })
      .join('');
  }
}

function tokenize(source: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  const seen = new Set<TemplateDirective>();
  let literal = '';

  for (let i = 0; i < source.length; i++) {
    const char = source.charAt(i);
    if (char !== '%') {
      literal += char;
      continue;
    }

    i++;
    if (i >= source.length) {
      throw new TemplateSyntaxError(`Template '${source}' ends with a lone '%'`, source);
    }

    const next = source.charAt(i);
    if (next === '%') {
      literal += '%';
      continue;
    }
    if (!isDirective(next)) {
      throw new TemplateSyntaxError(`Unsupported directive '%${next}' in template '${source}'`, source);
    }
    if (seen.has(next)) {
      throw new TemplateSyntaxError(`Directive '%${next}' appears more than once in template '${source}'`, source);
    }
    seen.add(next);

    if (literal) {
      tokens.push({ kind: 'literal', text: literal });
      literal = '';
    }
    tokens.push({ kind: 'directive', directive: next });
  }

  if (literal) {
    tokens.push({ kind: 'literal', text: literal });
  }

  return tokens;
}
