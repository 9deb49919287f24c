/**
 * rowquery Types
 *
 * Shared type definitions for the query engine: the value model, rows,
 * parsed queries, responses and the table provider contract.
 */

import type { WhereExpression } from './condition';

// ============================================================================
// Value Model
// ============================================================================

export interface NullValue {
  kind: 'null';
}

export interface BoolValue {
  kind: 'bool';
  value: boolean;
}

export interface IntValue {
  kind: 'int';
  value: number;
}

export interface FloatValue {
  kind: 'float';
  value: number;
}

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface ListValue {
  kind: 'list';
  items: readonly Value[];
}

export interface MapValue {
  kind: 'map';
  entries: Readonly<Record<string, Value>>;
}

/**
 * A dynamic field or literal value. Every field of every row and every literal
 * in a query is one of these.
 */
export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | ListValue
  | MapValue;

/**
 * The kind tag of a value
 */
export type ValueKind = Value['kind'];

/**
 * Plain JSON-compatible data, as supplied by providers and returned to callers
 */
export type PlainValue =
  | null
  | boolean
  | number
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

/**
 * One logical record of a table
 */
export type Row = Record<string, Value>;

/**
 * A row converted back to plain data
 */
export type PlainRow = Record<string, PlainValue>;

// ============================================================================
// Table Provider
// ============================================================================

/**
 * External collaborator that supplies the rows of named tables.
 *
 * `getRows` must return a fresh snapshot on every call; the engine never
 * mutates it and never caches it between calls.
 */
export interface TableProvider {
  /** Whether a table with this name exists */
  hasTable(name: string): boolean;
  /** Names of every known table */
  getTableNames(): Set<string>;
  /** Every row of the table */
  getRows(name: string): Row[];
  /** Optional human readable description of a table */
  getTableDescription?(name: string): string | undefined;
}

// ============================================================================
// Parsed Query
// ============================================================================

/**
 * Aggregate functions understood by the engine
 */
export const AGGREGATE_FUNCTIONS = ['COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'STDDEV', 'VARIANCE'] as const;

export type AggregateFunctionName = typeof AGGREGATE_FUNCTIONS[number];

/**
 * An aggregate call in the SELECT list
 */
export interface AggregateSpec {
  /** Upper-cased function name */
  fn: AggregateFunctionName;
  /** Field path, or `*` for COUNT(*) */
  field: string;
}

export type SortDirection = 'ASC' | 'DESC';

export interface OrderSpec {
  field: string;
  direction: SortDirection;
}

/**
 * Output of the SELECT parser
 */
export interface SelectClause {
  /** Output column names in order (aliases and auto aliases included) */
  fields: string[];
  /** Whether DISTINCT was given */
  distinct: boolean;
  /** Output column -> aggregate call */
  aggregates: Map<string, AggregateSpec>;
  /** Alias -> source expression text */
  aliases: Map<string, string>;
}

/**
 * Comparison operators a WHERE condition can carry. The textual `NOT` forms
 * (`NOT IN`, `NOT LIKE`, `NOT ILIKE`, `NOT BETWEEN`) are represented by the
 * base operator plus `negated: true`.
 */
export type WhereOperator =
  | '='
  | '!='
  | '<>'
  | '>'
  | '<'
  | '>='
  | '<='
  | 'LIKE'
  | 'ILIKE'
  | 'IN'
  | 'BETWEEN'
  | 'IS'
  | 'IS NOT';

export type Combinator = 'AND' | 'OR';

/**
 * A fully parsed query
 */
export interface ParsedQuery extends SelectClause {
  /** Table named in FROM */
  table: string;
  /** Parsed WHERE clause (empty when absent) */
  where: WhereExpression;
  groupBy: string[];
  orderBy: OrderSpec[];
  /** LIMIT from the query text, or null when absent */
  limit: number | null;
}

// ============================================================================
// Responses
// ============================================================================

export const OUTPUT_FORMATS = ['json', 'csv', 'table'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export type QueryStatus = 'success' | 'error';

/**
 * Result of executing a query. `data` is present on success, `error` on error.
 */
export interface QueryResponse {
  status: QueryStatus;
  /** The requested format */
  format: string;
  /** Number of rows in the final result */
  count: number;
  /** Plain rows for json, text for csv and table */
  data?: PlainRow[] | string;
  error?: string;
}
