import { splitTopLevel } from './clauses';
import { QuerySyntaxError } from './errors';
import { aggregateLabel, isValidFieldPath, parseAggregateCall } from './select';
import type { OrderSpec, Row, SortDirection, Value } from './types';
import { compareLoose, int, str, toPlain } from './value';

const ORDER_ITEM_PATTERN = /^(.*?)(?:\s+([A-Za-z]+))?$/s;

function isSortDirection(word: string): word is SortDirection {
  return word === 'ASC' || word === 'DESC';
}

/**
 * Parse an ORDER BY list such as `type ASC, COUNT(*) DESC`.
 *
 * Items are field paths or aggregate calls; aggregate calls are normalised to
 * their column label (`count( * )` becomes `COUNT(*)`).
 */
export function parseOrderBy(clause: string): OrderSpec[] {
  const text = clause.trim();
  if (!text) {
    throw new QuerySyntaxError('ORDER BY', 'Empty ORDER BY clause');
  }

  return splitTopLevel(text, 'ORDER BY').map((item) => {
    if (!item) {
      throw new QuerySyntaxError('ORDER BY', 'Empty field in ORDER BY clause');
    }

    const match = ORDER_ITEM_PATTERN.exec(item);
    let expression = item;
    let direction: SortDirection = 'ASC';

    if (match && match[2] !== undefined && match[1].trim()) {
      const word = match[2].toUpperCase();
      if (!isSortDirection(word)) {
        throw new QuerySyntaxError('ORDER BY', `Invalid sort direction: ${match[2]}. Use ASC or DESC`);
      }
      expression = match[1].trim();
      direction = word;
    }

    const aggregate = parseAggregateCall(expression, 'ORDER BY');
    if (aggregate) {
      return { field: aggregateLabel(aggregate), direction };
    }
    if (!isValidFieldPath(expression)) {
      throw new QuerySyntaxError('ORDER BY', `Invalid field name in ORDER BY: ${expression}`);
    }
    return { field: expression, direction };
  });
}

/**
 * Value used as the sort key: booleans order as 0/1 and structured values by
 * their JSON text.
 */
function sortKey(value: Value): Value {
  switch (value.kind) {
    case 'bool':
      return int(value.value ? 1 : 0);
    case 'list':
    case 'map':
      return str(JSON.stringify(toPlain(value)));
    default:
      return value;
  }
}

function compareForSort(a: Value, b: Value, direction: SortDirection): number {
  const aNull = a.kind === 'null';
  const bNull = b.kind === 'null';
  if (aNull || bNull) {
    // nulls last in both directions
    return aNull === bNull ? 0 : aNull ? 1 : -1;
  }

  const cmp = compareLoose(sortKey(a), sortKey(b));
  return direction === 'DESC' ? -cmp : cmp;
}

/**
 * Stable multi-key sort. `valueOf` reads the sort column from a row.
 */
export function sortRows(rows: Row[], orderBy: OrderSpec[], valueOf: (row: Row, field: string) => Value): Row[] {
  if (orderBy.length === 0) {
    return rows;
  }

  return [...rows].sort((a, b) => {
    for (const { field, direction } of orderBy) {
      const cmp = compareForSort(valueOf(a, field), valueOf(b, field), direction);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
}
