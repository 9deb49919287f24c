import type { Combinator, Row, Value, WhereOperator } from './types';
import {
  NULL,
  bool,
  compareLoose,
  compareText,
  compareValues,
  isNumeric,
  parseNumber,
  resolvePath,
  valueToText,
  valuesEqual,
} from './value';

const TRUTHY_STRINGS = ['true', '1', 'yes', 'on'];

/**
 * Coerce a literal towards the type of the row value it is compared with.
 *
 * - numeric row value, string literal that looks numeric → int or float
 * - boolean row value, string literal → true for `true`, `1`, `yes`, `on`
 *
 * Anything else is returned unchanged; mismatched types then fall back to
 * text comparison in the operators that order values.
 */
export function coerceLiteral(rowValue: Value, literal: Value): Value {
  if (literal.kind !== 'string') {
    return literal;
  }
  if (isNumeric(rowValue)) {
    return parseNumber(literal.value) ?? literal;
  }
  if (rowValue.kind === 'bool') {
    return bool(TRUTHY_STRINGS.includes(literal.value.toLowerCase()));
  }
  return literal;
}

/**
 * Translate a LIKE pattern into a regular expression. `%` matches any run of
 * characters and `_` a single character; the match is case-insensitive and
 * may occur anywhere in the text.
 */
export function likeToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/%/g, '.*')
    .replace(/_/g, '.');
  return new RegExp(source, 'is');
}

/**
 * A single WHERE condition: `field operator literal`.
 *
 * For IN the literal is a list of candidates; for BETWEEN a list of the two
 * bounds. `negated` inverts the final result and carries the textual NOT
 * forms (NOT IN, NOT LIKE, NOT ILIKE, NOT BETWEEN).
 */
export class WhereCondition {
  constructor(
    public readonly field: string,
    public readonly operator: WhereOperator,
    public readonly value: Value,
    public readonly negated: boolean = false,
  ) {}

  evaluate(row: Row): boolean {
    const result = this.test(row);
    return this.negated ? !result : result;
  }

  private test(row: Row): boolean {
    const found = resolvePath(row, this.field);
    const isNullCheck = this.operator === 'IS' || this.operator === 'IS NOT';

    if (found === undefined && !isNullCheck) {
      return false;
    }
    const rowValue = found ?? NULL;

    switch (this.operator) {
      case 'IS':
        return this.value.kind === 'null' ? rowValue.kind === 'null' : valuesEqual(rowValue, this.value);
      case 'IS NOT':
        return this.value.kind === 'null' ? rowValue.kind !== 'null' : !valuesEqual(rowValue, this.value);
      case 'IN':
        return this.value.kind === 'list' && this.value.items.some(item => valuesEqual(rowValue, item));
      case 'BETWEEN':
        return this.between(rowValue);
      default:
        return this.compare(rowValue, coerceLiteral(rowValue, this.value));
    }
  }

  /**
   * Ordering operators fall back to comparing text when the kinds differ,
   * null included.
   */
  private compare(rowValue: Value, literal: Value): boolean {
    switch (this.operator) {
      case '=':
        return valuesEqual(rowValue, literal);
      case '!=':
      case '<>':
        return !valuesEqual(rowValue, literal);
      case '>':
        return compareLoose(rowValue, literal) > 0;
      case '<':
        return compareLoose(rowValue, literal) < 0;
      case '>=':
        return compareLoose(rowValue, literal) >= 0;
      case '<=':
        return compareLoose(rowValue, literal) <= 0;
      case 'LIKE':
      case 'ILIKE':
        return likeToRegExp(valueToText(literal)).test(valueToText(rowValue));
      default:
        return false;
    }
  }

  private between(rowValue: Value): boolean {
    if (this.value.kind !== 'list' || this.value.items.length !== 2) {
      return false;
    }
    const [low, high] = this.value.items;

    const lowCmp = compareValues(low, rowValue);
    const highCmp = compareValues(rowValue, high);
    if (lowCmp !== undefined && highCmp !== undefined) {
      return lowCmp <= 0 && highCmp <= 0;
    }

    const text = valueToText(rowValue);
    return compareText(valueToText(low), text) <= 0 && compareText(text, valueToText(high)) <= 0;
  }

  toString(): string {
    return `${this.field} ${this.negated ? 'NOT ' : ''}${this.operator} ${valueToText(this.value)}`;
  }
}

/**
 * A WHERE clause: conditions joined by AND/OR.
 *
 * There is no precedence between AND and OR. The result is folded strictly
 * left to right, so `a OR b AND c` evaluates as `(a OR b) AND c`.
 */
export class WhereExpression {
  constructor(
    public readonly conditions: WhereCondition[] = [],
    public readonly combinators: Combinator[] = [],
  ) {
    if (conditions.length > 0 && combinators.length !== conditions.length - 1) {
      throw new Error(`Expected ${conditions.length - 1} combinators for ${conditions.length} conditions, got ${combinators.length}`);
    }
  }

  isEmpty(): boolean {
    return this.conditions.length === 0;
  }

  evaluate(row: Row): boolean {
    if (this.conditions.length === 0) {
      return true;
    }

    let result = this.conditions[0].evaluate(row);
    this.combinators.forEach((combinator, i) => {
      const next = this.conditions[i + 1].evaluate(row);
      result = combinator === 'AND' ? result && next : result || next;
    });

    return result;
  }
}
