import { applyAggregate } from './aggregate';
import type { AggregateSpec, Row, SelectClause, Value } from './types';
import { NULL, lookupPath, map, tupleKey } from './value';

/**
 * Reads an output column from an intermediate row.
 */
export type ColumnReader = (row: Row, field: string) => Value;

/**
 * Value of `field` in a row. A key equal to the whole field text wins over
 * path resolution, so grouped rows keyed by `data.type` read back directly.
 */
export function fieldValue(row: Row, field: string): Value {
  if (Object.hasOwn(row, field)) {
    return row[field];
  }
  return lookupPath(row, field);
}

/**
 * Column reader for a SELECT list: aggregate columns are read by name and
 * aliased fields from their source path.
 */
export function columnReader(select: SelectClause): ColumnReader {
  return (row, field) => {
    if (select.aggregates.has(field)) {
      return row[field] ?? NULL;
    }
    const source = select.aliases.get(field);
    if (source !== undefined && !Object.hasOwn(row, field)) {
      return fieldValue(row, source);
    }
    return fieldValue(row, field);
  };
}

function computeAggregates(rows: Row[], aggregates: Map<string, AggregateSpec>, out: Row): Row {
  for (const [column, spec] of aggregates) {
    out[column] = applyAggregate(spec.fn, spec.field, rows);
  }
  return out;
}

/**
 * Partition rows by the values of the GROUP BY fields and produce one row per
 * group holding the group fields and the aggregate columns. Groups come out
 * in order of first appearance; missing fields group as null.
 */
export function groupRows(rows: Row[], groupBy: string[], aggregates: Map<string, AggregateSpec>): Row[] {
  const groups = new Map<string, { key: Value[]; rows: Row[] }>();

  for (const row of rows) {
    const key = groupBy.map(field => lookupPath(row, field));
    const id = tupleKey(key);

    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  return Array.from(groups.values(), (group) => {
    const out: Row = {};
    groupBy.forEach((field, i) => {
      out[field] = group.key[i];
    });
    return computeAggregates(group.rows, aggregates, out);
  });
}

/**
 * Aggregates without GROUP BY: one row over the whole input, or no rows when
 * the input is empty.
 */
export function aggregateAll(rows: Row[], aggregates: Map<string, AggregateSpec>): Row[] {
  if (rows.length === 0) {
    return [];
  }
  return [computeAggregates(rows, aggregates, {})];
}

/**
 * Keep the first row of each distinct combination of the projected fields.
 * With `*` whole rows are compared.
 */
export function distinctRows(rows: Row[], fields: string[], read: ColumnReader): Row[] {
  const seen = new Set<string>();

  return rows.filter((row) => {
    const key = fields.includes('*')
      ? tupleKey([map(row)])
      : tupleKey(fields.map(field => read(row, field)));

    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Build output rows holding exactly the selected columns, in order.
 */
export function projectRows(rows: Row[], fields: string[], read: ColumnReader): Row[] {
  return rows.map((row) => {
    const out: Row = {};
    for (const field of fields) {
      out[field] = read(row, field);
    }
    return out;
  });
}
