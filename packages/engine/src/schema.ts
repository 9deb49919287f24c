import type { PlainValue, Row, Value } from './types';
import { friendlyTypeName, resolvePath, toPlain } from './value';

/**
 * What is known about one top-level field of a table
 */
export interface FieldInfo {
  /** Friendly type name, or `mixed` when rows disagree */
  type: string;
  /** Whether any sampled row holds null */
  nullable: boolean;
  /** Distinct sample values, when requested */
  sampleValues?: PlainValue[];
}

export interface AnalyzeOptions {
  includeSamples?: boolean;
  maxSamples?: number;
}

/**
 * Describe the top-level fields of a set of rows. A field whose non-null
 * values have different types is `mixed`; one that is only ever null has
 * type `null`.
 */
export function analyzeFields(rows: Row[], options: AnalyzeOptions = {}): Record<string, FieldInfo> {
  const { includeSamples = false, maxSamples = 3 } = options;
  const fields: Record<string, FieldInfo> = {};
  const samples = new Map<string, Set<string>>();

  for (const row of rows) {
    for (const [name, value] of Object.entries(row)) {
      let info = fields[name];
      if (!info) {
        info = { type: 'null', nullable: false };
        if (includeSamples) info.sampleValues = [];
        fields[name] = info;
      }

      if (value.kind === 'null') {
        info.nullable = true;
        continue;
      }

      info.type = mergeType(info.type, friendlyTypeName(value));

      if (info.sampleValues && info.sampleValues.length < maxSamples) {
        addSample(info.sampleValues, samples, name, value);
      }
    }
  }

  return fields;
}

/**
 * Combine the type seen so far with a new one. An empty array says nothing
 * about its elements, so `array` and `array[x]` merge to `array[x]`.
 */
function mergeType(current: string, next: string): string {
  if (current === 'null' || current === next) return next;
  if (current === 'array' && next.startsWith('array[')) return next;
  if (next === 'array' && current.startsWith('array[')) return current;
  return 'mixed';
}

function addSample(target: PlainValue[], seen: Map<string, Set<string>>, field: string, value: Value): void {
  const plain = toPlain(value);
  const key = JSON.stringify(plain);

  let keys = seen.get(field);
  if (!keys) {
    keys = new Set();
    seen.set(field, keys);
  }
  if (!keys.has(key)) {
    keys.add(key);
    target.push(plain);
  }
}

function collectPaths(entries: Readonly<Record<string, Value>>, prefix: string, depth: number, maxDepth: number, out: Set<string>): void {
  if (depth > maxDepth) return;

  for (const [key, value] of Object.entries(entries)) {
    const path = prefix ? `${prefix}.${key}` : key;
    out.add(path);
    if (value.kind === 'map') {
      collectPaths(value.entries, path, depth + 1, maxDepth, out);
    }
  }
}

/**
 * Field paths present in the given rows, nested objects included down to
 * `maxDepth` levels below the top, sorted.
 */
export function availableFields(rows: Row[], maxDepth = 3): string[] {
  const paths = new Set<string>();
  for (const row of rows) {
    collectPaths(row, '', 0, maxDepth, paths);
  }
  return [...paths].sort();
}

/**
 * Comma separated field list for error messages, cut off after `max` entries.
 */
export function describeFields(fields: string[], max = 20): string {
  const shown = fields.slice(0, max).join(', ');
  return fields.length > max ? `${shown}, ...` : shown;
}

/**
 * Whether a field path resolves in at least one of the rows.
 */
export function fieldExists(field: string, rows: Row[]): boolean {
  return rows.some(row => resolvePath(row, field) !== undefined);
}
