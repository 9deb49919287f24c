import { z } from 'zod';
import type { PlainRow, PlainValue, Row, Value } from './types';

/**
 * =============================================================================
 * VALUE CONSTRUCTORS
 * =============================================================================
 */

export const NULL: Value = { kind: 'null' };

export function bool(value: boolean): Value {
  return { kind: 'bool', value };
}

export function int(value: number): Value {
  return { kind: 'int', value: Math.trunc(value) };
}

export function float(value: number): Value {
  return { kind: 'float', value };
}

export function str(value: string): Value {
  return { kind: 'string', value };
}

export function list(items: Value[]): Value {
  return { kind: 'list', items };
}

export function map(entries: Record<string, Value>): Value {
  return { kind: 'map', entries };
}

/**
 * A number as int when it has no fractional part, float otherwise.
 */
export function num(value: number): Value {
  return Number.isInteger(value) ? int(value) : float(value);
}

/**
 * =============================================================================
 * PLAIN DATA CONVERSION
 * =============================================================================
 */

/**
 * Zod schema for JSON-compatible plain data
 */
export const PlainValueSchema: z.ZodType<PlainValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(PlainValueSchema),
    z.record(z.string(), PlainValueSchema),
  ])
);

export const PlainRowSchema: z.ZodType<PlainRow> = z.record(z.string(), PlainValueSchema);

/**
 * Convert plain data into a Value.
 */
export function fromPlain(value: PlainValue): Value {
  if (value === null) return NULL;
  if (typeof value === 'boolean') return bool(value);
  if (typeof value === 'number') return num(value);
  if (typeof value === 'string') return str(value);
  if (Array.isArray(value)) return list(value.map(fromPlain));

  const entries: Record<string, Value> = {};
  for (const [key, item] of Object.entries(value)) {
    entries[key] = fromPlain(item);
  }
  return map(entries);
}

/**
 * Validate untrusted input as plain data and convert it into a Value.
 * Throws a ZodError when the input is not JSON-compatible.
 */
export function parsePlain(input: unknown): Value {
  return fromPlain(PlainValueSchema.parse(input));
}

/**
 * Convert a plain object into a Row.
 */
export function rowFromPlain(input: PlainRow): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(input)) {
    row[key] = fromPlain(value);
  }
  return row;
}

/**
 * Convert a Value back into plain data.
 */
export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return value.value;
    case 'list':
      return value.items.map(toPlain);
    case 'map': {
      const out: Record<string, PlainValue> = {};
      for (const [key, item] of Object.entries(value.entries)) {
        out[key] = toPlain(item);
      }
      return out;
    }
  }
}

export function rowToPlain(row: Row): PlainRow {
  const out: PlainRow = {};
  for (const [key, value] of Object.entries(row)) {
    out[key] = toPlain(value);
  }
  return out;
}

/**
 * =============================================================================
 * INSPECTION
 * =============================================================================
 */

export function isNull(value: Value): boolean {
  return value.kind === 'null';
}

export function isNumeric(value: Value): value is Extract<Value, { kind: 'int' | 'float' }> {
  return value.kind === 'int' || value.kind === 'float';
}

/**
 * Resolve a dotted field path through nested maps.
 * Returns undefined when any segment is missing.
 */
export function resolvePath(row: Row, path: string): Value | undefined {
  let current: Value = { kind: 'map', entries: row };

  for (const segment of path.split('.')) {
    if (current.kind !== 'map' || !Object.hasOwn(current.entries, segment)) {
      return undefined;
    }
    current = current.entries[segment];
  }

  return current;
}

/**
 * Resolve a dotted field path, treating missing segments as null.
 */
export function lookupPath(row: Row, path: string): Value {
  return resolvePath(row, path) ?? NULL;
}

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse numeric-looking text: a float when it contains `.` or `e`, an int
 * otherwise. Returns undefined when the text is not a number.
 */
export function parseNumber(text: string): Value | undefined {
  const trimmed = text.trim();
  if (trimmed.includes('.') || trimmed.toLowerCase().includes('e')) {
    return FLOAT_PATTERN.test(trimmed) ? float(Number(trimmed)) : undefined;
  }
  return INT_PATTERN.test(trimmed) ? int(Number(trimmed)) : undefined;
}

/**
 * Text form of a value, used when comparisons fall back to strings and for
 * pattern matching.
 */
export function valueToText(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
    case 'float':
      return String(value.value);
    case 'string':
      return value.value;
    case 'list':
    case 'map':
      return JSON.stringify(toPlain(value));
  }
}

/**
 * Round to 6 decimal places.
 */
export function roundFloat(value: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }
  return Number(value.toFixed(6));
}

/**
 * Text form of a value inside CSV and table output.
 */
export function formatCell(value: Value | undefined): string {
  if (!value) return '';

  switch (value.kind) {
    case 'null':
      return '';
    case 'float':
      return floatText(roundFloat(value.value));
    default:
      return valueToText(value);
  }
}

/**
 * A float keeps its fractional point when it happens to be integral, so
 * `AVG` of 1 and 3 prints as `2.0`.
 */
function floatText(value: number): string {
  const text = String(value);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

/**
 * =============================================================================
 * COMPARISON
 * =============================================================================
 */

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Equality between values. Ints and floats compare by numeric value; other
 * kinds only equal values of the same kind.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    return a.value === b.value;
  }

  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'list':
      return b.kind === 'list'
        && a.items.length === b.items.length
        && a.items.every((item, i) => valuesEqual(item, b.items[i]));
    case 'map': {
      if (b.kind !== 'map') return false;
      const keys = Object.keys(a.entries);
      return keys.length === Object.keys(b.entries).length
        && keys.every(key => Object.hasOwn(b.entries, key) && valuesEqual(a.entries[key], b.entries[key]));
    }
    default:
      return false;
  }
}

/**
 * Natural ordering between two values. Returns undefined when the two values
 * have no natural order (different kinds, nulls or maps), in which case callers
 * fall back to comparing text.
 */
export function compareValues(a: Value, b: Value): number | undefined {
  if (isNumeric(a) && isNumeric(b)) {
    return sign(a.value - b.value);
  }
  if (a.kind === 'string' && b.kind === 'string') {
    return compareText(a.value, b.value);
  }
  if (a.kind === 'bool' && b.kind === 'bool') {
    return sign(Number(a.value) - Number(b.value));
  }
  if (a.kind === 'list' && b.kind === 'list') {
    const n = Math.min(a.items.length, b.items.length);
    for (let i = 0; i < n; i++) {
      const cmp = compareValues(a.items[i], b.items[i]);
      if (cmp === undefined) return undefined;
      if (cmp !== 0) return cmp;
    }
    return sign(a.items.length - b.items.length);
  }
  return undefined;
}

/**
 * Ordering that never fails: natural order when there is one, text order
 * otherwise.
 */
export function compareLoose(a: Value, b: Value): number {
  return compareValues(a, b) ?? compareText(valueToText(a), valueToText(b));
}

/**
 * =============================================================================
 * KEYS
 * =============================================================================
 */

function keyShape(value: Value): unknown {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
      return ['b', value.value];
    case 'int':
    case 'float':
      return ['n', value.value];
    case 'string':
      return ['s', value.value];
    case 'list':
      return ['l', value.items.map(keyShape)];
    case 'map':
      return ['m', Object.keys(value.entries).sort().map(key => [key, keyShape(value.entries[key])])];
  }
}

/**
 * Canonical key of a tuple of values, used for grouping and DISTINCT.
 * Values that are equal under `valuesEqual` share a key; map key order is
 * ignored.
 */
export function tupleKey(values: Value[]): string {
  return JSON.stringify(values.map(keyShape));
}

/**
 * User facing type name of a value.
 */
export function friendlyTypeName(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'bool':
      return 'boolean';
    case 'int':
      return 'integer';
    case 'float':
      return 'float';
    case 'string':
      return 'string';
    case 'list':
      return value.items.length > 0 ? `array[${friendlyTypeName(value.items[0])}]` : 'array';
    case 'map':
      return 'object';
  }
}
