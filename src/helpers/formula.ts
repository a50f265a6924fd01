/**
 * Register formulas
 *
 * The registers map describes how raw buffer values convert to readings with
 * small arithmetic formulas such as `#/2` or `(# - 100) / 10`, where `#`
 * stands for the input value. Brace format strings (`{0:.1f}`) round
 * the result.
 */

import { ServiceError } from '../errors';

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'operator'; value: '+' | '-' | '*' | '/' | '%' }
  | { kind: 'paren'; value: '(' | ')' };

function tokenize(formula: string, input: number): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < formula.length) {
    const char = formula[i];

    if (char === ' ' || char === '\t') {
      i++;
    } else if (char === '#') {
      tokens.push({ kind: 'number', value: input });
      i++;
    } else if (char === '(' || char === ')') {
      tokens.push({ kind: 'paren', value: char });
      i++;
    } else if (char === '+' || char === '-' || char === '*' || char === '/' || char === '%') {
      tokens.push({ kind: 'operator', value: char });
      i++;
    } else if (/[0-9.]/.test(char)) {
      let end = i;
      while (end < formula.length && /[0-9.]/.test(formula[end])) {
        end++;
      }
      const value = Number(formula.slice(i, end));
      if (Number.isNaN(value)) {
        throw new ServiceError(`Malformed number in register formula "${formula}"`);
      }
      tokens.push({ kind: 'number', value });
      i = end;
    } else {
      throw new ServiceError(`Unsupported character "${char}" in register formula "${formula}"`);
    }
  }

  return tokens;
}

/**
 * Recursive descent over:
 *   expression := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '%') unary)*
 *   unary      := '-' unary | '+' unary | primary
 *   primary    := number | '(' expression ')'
 */
class FormulaParser {
  private position = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly formula: string,
  ) {}

  public parse(): number {
    const value = this.expression();
    if (this.position < this.tokens.length) {
      throw this.error('unexpected trailing input');
    }
    return value;
  }

  private expression(): number {
    let value = this.term();
    for (;;) {
      const token = this.peek();
      if (token?.kind !== 'operator' || (token.value !== '+' && token.value !== '-')) {
        return value;
      }
      this.position++;
      const right = this.term();
      value = token.value === '+' ? value + right : value - right;
    }
  }

  private term(): number {
    let value = this.unary();
    for (;;) {
      const token = this.peek();
      if (token?.kind !== 'operator' || token.value === '+' || token.value === '-') {
        return value;
      }
      this.position++;
      const right = this.unary();
      if (token.value === '*') {
        value *= right;
      } else if (right === 0) {
        throw this.error('division by zero');
      } else if (token.value === '/') {
        value /= right;
      } else {
        value %= right;
      }
    }
  }

  private unary(): number {
    const token = this.peek();
    if (token?.kind === 'operator' && (token.value === '-' || token.value === '+')) {
      this.position++;
      const operand = this.unary();
      return token.value === '-' ? -operand : operand;
    }
    return this.primary();
  }

  private primary(): number {
    const token = this.peek();
    if (!token) {
      throw this.error('unexpected end of input');
    }
    this.position++;

    if (token.kind === 'number') {
      return token.value;
    }
    if (token.kind === 'paren' && token.value === '(') {
      const value = this.expression();
      const closing = this.peek();
      if (closing?.kind !== 'paren' || closing.value !== ')') {
        throw this.error('missing closing parenthesis');
      }
      this.position++;
      return value;
    }
    throw this.error(`unexpected "${token.value}"`);
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private error(reason: string): ServiceError {
    return new ServiceError(`Invalid register formula "${this.formula}": ${reason}`);
  }
}

/**
 * Evaluate a register formula with `#` bound to `input`
 */
export function evaluateFormula(formula: string, input: number): number {
  return new FormulaParser(tokenize(formula, input), formula).parse();
}

/**
 * Like `toFixed`, except that a value exactly halfway between two results
 * rounds to the even one: 22.5 gives "22", 23.5 gives "24".
 */
function toFixedHalfEven(value: number, digits: number): string {
  const fixed = value.toFixed(digits);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21 || digits >= 100) {
    return fixed;
  }

  // toFixed(100) spells out the exact binary value
  const exact = Math.abs(value).toFixed(100);
  const point = exact.indexOf('.');
  if (!/^50*$/.test(exact.slice(point + 1 + digits))) {
    return fixed;
  }

  const truncated = digits === 0 ? exact.slice(0, point) : exact.slice(0, point + 1 + digits);
  if (Number(truncated.charAt(truncated.length - 1)) % 2 === 1) {
    return fixed;
  }
  return value < 0 ? `-${truncated}` : truncated;
}

/**
 * Apply a brace format string to a single value.
 * Supports `{}`, `{0}`, `{:.Nf}`, `{0:.Nf}` and `{0:d}`; text around the
 * placeholder is kept.
 */
export function applyFormatString(formatString: string, value: number): string {
  return formatString.replace(/\{0?(?::([^}]*))?\}/g, (_match, spec: string | undefined) => {
    if (spec === undefined || spec === '') {
      return String(value);
    }
    const fixed = /^\.(\d+)f$/.exec(spec);
    if (fixed) {
      return toFixedHalfEven(value, Number(fixed[1]));
    }
    if (spec === 'd') {
      return String(Math.trunc(value));
    }
    throw new ServiceError(`Unsupported format specification "${spec}" in "${formatString}"`);
  });
}
