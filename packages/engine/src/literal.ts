import { splitTopLevel } from './clauses';
import type { Value } from './types';
import { NULL, bool, parseNumber, str } from './value';

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
};

/**
 * Undo the escapes allowed inside a quoted literal: doubled quotes and the
 * backslash escapes `\n`, `\t`, `\r` and `\\`.
 */
export function unescapeString(text: string): string {
  return text
    .replace(/''/g, "'")
    .replace(/""/g, '"')
    .replace(/\\([ntr\\])/g, (_, ch: string) => ESCAPES[ch]);
}

function isQuoted(text: string): boolean {
  return text.length >= 2
    && (text[0] === "'" || text[0] === '"')
    && text[text.length - 1] === text[0];
}

/**
 * Parse a literal from query text.
 *
 * - `NULL` → null
 * - `TRUE` / `FALSE` → boolean (case-insensitive)
 * - `'text'` or `"text"` → string
 * - numbers → int, or float when the text has `.` or `e`
 * - anything else → the bare text as a string
 */
export function parseLiteral(text: string): Value {
  const trimmed = text.trim();
  if (!trimmed) return str('');

  const upper = trimmed.toUpperCase();
  if (upper === 'NULL') return NULL;
  if (upper === 'TRUE' || upper === 'FALSE') return bool(upper === 'TRUE');

  if (isQuoted(trimmed)) {
    return str(unescapeString(trimmed.slice(1, -1)));
  }

  return parseNumber(trimmed) ?? str(trimmed);
}

/**
 * Parse the comma separated values inside `IN (...)`. Empty items are skipped.
 */
export function parseLiteralList(text: string): Value[] {
  if (!text.trim()) return [];

  return splitTopLevel(text, 'WHERE')
    .filter(part => part.length > 0)
    .map(parseLiteral);
}
