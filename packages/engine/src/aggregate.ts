import { QuerySyntaxError } from './errors';
import type { Row, Value } from './types';
import { NULL, float, int, lookupPath, parseNumber, resolvePath } from './value';

/**
 * Numeric form of a value for SUM/AVG/MIN/MAX/STDDEV/VARIANCE.
 * Booleans count as 0/1 and numeric-looking strings are parsed; anything
 * else has no numeric form.
 */
function toNumber(value: Value): number | undefined {
  switch (value.kind) {
    case 'int':
    case 'float':
      return value.value;
    case 'bool':
      return value.value ? 1 : 0;
    case 'string': {
      const parsed = parseNumber(value.value);
      return parsed && (parsed.kind === 'int' || parsed.kind === 'float') ? parsed.value : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Collect the numeric sample of a field across rows, skipping nulls, missing
 * fields and values with no numeric form.
 */
export function numericSample(field: string, rows: Row[]): number[] {
  const sample: number[] = [];
  for (const row of rows) {
    const value = resolvePath(row, field);
    if (!value) continue;

    const n = toNumber(value);
    if (n !== undefined) {
      sample.push(n);
    }
  }
  return sample;
}

function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/**
 * Sample variance (n - 1 denominator). 0 for fewer than two values.
 */
function sampleVariance(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = sum(values) / values.length;
  return sum(values.map(x => (x - mean) ** 2)) / (values.length - 1);
}

/**
 * Apply an aggregate function to a field over a set of rows.
 *
 * COUNT(*) counts rows and COUNT(field) counts non-null values. The other
 * functions work on the numeric sample of the field and return null when
 * the sample is empty.
 */
export function applyAggregate(fn: string, field: string, rows: Row[]): Value {
  const name = fn.toUpperCase();

  if (name === 'COUNT') {
    if (field === '*') {
      return int(rows.length);
    }
    return int(rows.filter(row => lookupPath(row, field).kind !== 'null').length);
  }

  if (!['SUM', 'AVG', 'MIN', 'MAX', 'STDDEV', 'VARIANCE'].includes(name)) {
    throw new QuerySyntaxError('SELECT', `Unsupported aggregate function: ${fn}`);
  }

  const values = numericSample(field, rows);
  if (values.length === 0) {
    return NULL;
  }

  switch (name) {
    case 'SUM':
      return float(sum(values));
    case 'AVG':
      return float(sum(values) / values.length);
    case 'MIN':
      return float(values.reduce((a, b) => Math.min(a, b)));
    case 'MAX':
      return float(values.reduce((a, b) => Math.max(a, b)));
    case 'STDDEV':
      return float(Math.sqrt(sampleVariance(values)));
    default:
      return float(sampleVariance(values));
  }
}
