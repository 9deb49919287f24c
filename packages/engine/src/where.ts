import { atTokenStart, scanTopLevel } from './clauses';
import { WhereCondition, WhereExpression } from './condition';
import { QuerySyntaxError } from './errors';
import { parseLiteral, parseLiteralList } from './literal';
import { isValidFieldPath } from './select';
import type { Combinator, WhereOperator } from './types';
import { NULL, list } from './value';

const FIELD = '([A-Za-z_][A-Za-z0-9_]*(?:\\.[A-Za-z_][A-Za-z0-9_]*)*)';

const IS_NOT_NULL_PATTERN = new RegExp(`^${FIELD}\\s+IS\\s+NOT\\s+NULL$`, 'i');
const IS_NULL_PATTERN = new RegExp(`^${FIELD}\\s+IS\\s+NULL$`, 'i');
const BETWEEN_PATTERN = new RegExp(`^${FIELD}\\s+(NOT\\s+)?BETWEEN\\s+(.+?)\\s+AND\\s+(.+)$`, 'is');
const IN_PATTERN = new RegExp(`^${FIELD}\\s+(NOT\\s+)?IN\\s*\\((.*)\\)$`, 'is');

const CONNECTIVE_PATTERN = /(AND|OR|BETWEEN)(?=\s|$)/iy;
const WORD_OPERATOR_PATTERN = /(NOT\s+ILIKE|NOT\s+LIKE|ILIKE|LIKE)(?=\s|$|['"])/iy;
const SYMBOL_OPERATORS = ['>=', '<=', '!=', '<>', '>', '<', '='] as const;

/**
 * Split WHERE text into condition texts and the AND/OR tokens between them.
 *
 * AND/OR are only separators when they are whole tokens outside quotes and
 * parentheses. The AND that closes a `BETWEEN x AND y` belongs to the
 * condition.
 */
export function splitConditions(text: string): { conditions: string[]; combinators: Combinator[] } {
  const conditions: string[] = [];
  const combinators: Combinator[] = [];
  let start = 0;
  let inBetween = false;

  scanTopLevel(text, 'WHERE', (i) => {
    if (!atTokenStart(text, i)) return;

    CONNECTIVE_PATTERN.lastIndex = i;
    const match = CONNECTIVE_PATTERN.exec(text);
    if (!match) return;

    const word = match[1].toUpperCase();
    if (word === 'BETWEEN') {
      inBetween = true;
    } else if (word === 'AND' && inBetween) {
      inBetween = false;
    } else {
      conditions.push(text.slice(start, i).trim());
      combinators.push(word === 'AND' ? 'AND' : 'OR');
      start = i + match[0].length;
    }
    return match[0].length;
  });
  conditions.push(text.slice(start).trim());

  return { conditions, combinators };
}

function findOperator(text: string): { index: number; token: string } | null {
  let found: { index: number; token: string } | null = null;

  scanTopLevel(text, 'WHERE', (i) => {
    if (found) return;

    const symbol = SYMBOL_OPERATORS.find(op => text.startsWith(op, i));
    if (symbol) {
      found = { index: i, token: symbol };
      return symbol.length;
    }

    if (atTokenStart(text, i)) {
      WORD_OPERATOR_PATTERN.lastIndex = i;
      const match = WORD_OPERATOR_PATTERN.exec(text);
      if (match) {
        found = { index: i, token: match[1] };
        return match[0].length;
      }
    }
  });

  return found;
}

const OPERATOR_TOKENS: Record<string, { operator: WhereOperator; negated: boolean }> = {
  'NOT LIKE': { operator: 'LIKE', negated: true },
  'NOT ILIKE': { operator: 'ILIKE', negated: true },
  LIKE: { operator: 'LIKE', negated: false },
  ILIKE: { operator: 'ILIKE', negated: false },
  '>=': { operator: '>=', negated: false },
  '<=': { operator: '<=', negated: false },
  '!=': { operator: '!=', negated: false },
  '<>': { operator: '<>', negated: false },
  '>': { operator: '>', negated: false },
  '<': { operator: '<', negated: false },
  '=': { operator: '=', negated: false },
};

function operatorFromToken(token: string): { operator: WhereOperator; negated: boolean } {
  const entry = OPERATOR_TOKENS[token.toUpperCase().replace(/\s+/g, ' ')];
  if (!entry) {
    throw new QuerySyntaxError('WHERE', `Unknown operator: ${token}`);
  }
  return entry;
}

/**
 * Parse one condition such as `type = 'MESH'`, `size BETWEEN 1 AND 5`,
 * `name NOT IN ('a', 'b')` or `parent IS NULL`.
 */
export function parseCondition(text: string): WhereCondition {
  const condition = text.trim();
  if (!condition) {
    throw new QuerySyntaxError('WHERE', 'Empty condition');
  }

  let match = IS_NOT_NULL_PATTERN.exec(condition);
  if (match) {
    return new WhereCondition(match[1], 'IS NOT', NULL);
  }

  match = IS_NULL_PATTERN.exec(condition);
  if (match) {
    return new WhereCondition(match[1], 'IS', NULL);
  }

  match = BETWEEN_PATTERN.exec(condition);
  if (match) {
    const bounds = list([parseLiteral(match[3]), parseLiteral(match[4])]);
    return new WhereCondition(match[1], 'BETWEEN', bounds, !!match[2]);
  }

  match = IN_PATTERN.exec(condition);
  if (match) {
    return new WhereCondition(match[1], 'IN', list(parseLiteralList(match[3])), !!match[2]);
  }

  const found = findOperator(condition);
  if (!found) {
    throw new QuerySyntaxError('WHERE', `No valid operator found in condition: ${condition}`);
  }

  const field = condition.slice(0, found.index).trim();
  const valueText = condition.slice(found.index + found.token.length).trim();

  if (!field) {
    throw new QuerySyntaxError('WHERE', `Missing field name in condition: ${condition}`);
  }
  if (!isValidFieldPath(field)) {
    throw new QuerySyntaxError('WHERE', `Invalid field name in condition: ${field}`);
  }
  if (!valueText) {
    throw new QuerySyntaxError('WHERE', `Missing value in condition: ${condition}`);
  }

  const { operator, negated } = operatorFromToken(found.token);
  return new WhereCondition(field, operator, parseLiteral(valueText), negated);
}

/**
 * Parse the text after WHERE into a WhereExpression.
 */
export function parseWhere(clause: string): WhereExpression {
  const text = clause.trim();
  if (!text) {
    throw new QuerySyntaxError('WHERE', 'Empty WHERE clause');
  }

  const { conditions, combinators } = splitConditions(text);
  return new WhereExpression(conditions.map(parseCondition), combinators);
}
