import { splitTopLevel } from './clauses';
import { QueryClause, QuerySyntaxError } from './errors';
import { AGGREGATE_FUNCTIONS, AggregateFunctionName, AggregateSpec, SelectClause } from './types';

const FIELD_PATH_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;

const ALIAS_PATTERN = /^(.+?)\s+AS\s+([A-Za-z_][A-Za-z0-9_]*)$/is;

const AGGREGATE_PATTERN = /^([A-Za-z_]+)\s*\(\s*(.*?)\s*\)$/s;

const DISTINCT_PATTERN = /^DISTINCT(?:\s+|$)/i;

/**
 * Whether text is a dotted field path such as `name` or `data.location.x`.
 */
export function isValidFieldPath(field: string): boolean {
  return FIELD_PATH_PATTERN.test(field);
}

function isAggregateName(name: string): name is AggregateFunctionName {
  return (AGGREGATE_FUNCTIONS as readonly string[]).includes(name);
}

/**
 * Parse text of the form `FUNC(field)` into an aggregate call.
 * Returns null when the text is not a call to a known aggregate function.
 */
export function parseAggregateCall(text: string, clause: QueryClause = 'SELECT'): AggregateSpec | null {
  const match = AGGREGATE_PATTERN.exec(text.trim());
  if (!match) return null;

  const fn = match[1].toUpperCase();
  if (!isAggregateName(fn)) return null;

  const field = match[2].trim();
  if (field === '*') {
    if (fn !== 'COUNT') {
      throw new QuerySyntaxError(clause, `Function ${fn} cannot be used with *`);
    }
  } else if (!isValidFieldPath(field)) {
    throw new QuerySyntaxError(clause, `Invalid field name in ${fn}(): ${field || '(empty)'}`);
  }

  return { fn, field };
}

/**
 * The column name an aggregate gets when it has no alias, e.g. `COUNT(*)`.
 */
export function aggregateLabel(spec: AggregateSpec): string {
  return `${spec.fn}(${spec.field})`;
}

/**
 * Parse the projection list of a SELECT clause (the text between SELECT and
 * FROM).
 */
export function parseSelect(clause: string): SelectClause {
  let text = clause.trim();
  if (!text) {
    throw new QuerySyntaxError('SELECT', 'Empty SELECT clause');
  }

  const distinct = DISTINCT_PATTERN.test(text);
  if (distinct) {
    text = text.replace(DISTINCT_PATTERN, '').trim();
    if (!text) {
      throw new QuerySyntaxError('SELECT', 'Empty field list after DISTINCT');
    }
  }

  const fields: string[] = [];
  const aggregates = new Map<string, AggregateSpec>();
  const aliases = new Map<string, string>();

  for (const item of splitTopLevel(text, 'SELECT')) {
    if (!item) {
      throw new QuerySyntaxError('SELECT', 'Empty field in SELECT clause');
    }

    const aliasMatch = ALIAS_PATTERN.exec(item);
    const expression = aliasMatch ? aliasMatch[1].trim() : item;
    const aggregate = parseAggregateCall(expression);

    if (aliasMatch) {
      const alias = aliasMatch[2];
      if (aggregate) {
        aggregates.set(alias, aggregate);
        aliases.set(alias, aggregateLabel(aggregate));
      } else {
        if (!isValidFieldPath(expression)) {
          throw new QuerySyntaxError('SELECT', `Invalid field name: ${expression}`);
        }
        aliases.set(alias, expression);
      }
      fields.push(alias);
    } else if (aggregate) {
      const label = aggregateLabel(aggregate);
      aggregates.set(label, aggregate);
      fields.push(label);
    } else {
      if (item !== '*' && !isValidFieldPath(item)) {
        throw new QuerySyntaxError('SELECT', `Invalid field name: ${item}`);
      }
      fields.push(item);
    }
  }

  if (fields.includes('*') && fields.length > 1) {
    throw new QuerySyntaxError('SELECT', '* cannot be combined with other fields');
  }

  return { fields, distinct, aggregates, aliases };
}

/**
 * Parse a GROUP BY field list.
 */
export function parseGroupBy(clause: string): string[] {
  const text = clause.trim();
  if (!text) {
    throw new QuerySyntaxError('GROUP BY', 'Empty GROUP BY clause');
  }

  return splitTopLevel(text, 'GROUP BY').map((field) => {
    if (!field) {
      throw new QuerySyntaxError('GROUP BY', 'Empty field name in GROUP BY');
    }
    if (!isValidFieldPath(field)) {
      throw new QuerySyntaxError('GROUP BY', `Invalid field name in GROUP BY: ${field}`);
    }
    return field;
  });
}

/**
 * Parse a LIMIT clause into a non-negative integer.
 */
export function parseLimit(clause: string): number {
  const text = clause.trim();
  if (!/^\d+$/.test(text)) {
    throw new QuerySyntaxError('LIMIT', `Invalid LIMIT value: ${text || '(empty)'}`);
  }
  return Number(text);
}
