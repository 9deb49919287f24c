import { QueryClause, QuerySyntaxError } from './errors';

/**
 * Clause texts of a query, split at the top-level keywords.
 * Optional clauses are undefined when their keyword is absent.
 */
export interface ClauseSet {
  select: string;
  from: string;
  where?: string;
  groupBy?: string;
  orderBy?: string;
  limit?: string;
}

type ClauseKey = keyof ClauseSet;

const CLAUSE_ORDER: ClauseKey[] = ['select', 'from', 'where', 'groupBy', 'orderBy', 'limit'];

const CLAUSE_NAMES: Record<ClauseKey, QueryClause> = {
  select: 'SELECT',
  from: 'FROM',
  where: 'WHERE',
  groupBy: 'GROUP BY',
  orderBy: 'ORDER BY',
  limit: 'LIMIT',
};

const KEYWORD_PATTERN = /(SELECT|FROM|WHERE|GROUP\s+BY|ORDER\s+BY|LIMIT)(?=\s|$)/iy;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const STRUCTURE_ERROR = 'Query must have SELECT ... FROM <table> structure';

function describe(clause: QueryClause): string {
  return clause === 'QUERY' ? 'query' : `${clause} clause`;
}

/**
 * Walk `text`, calling `onChar` for every character that sits outside quotes
 * and parentheses. `onChar` may return how many characters it consumed.
 *
 * Quotes are `'` or `"`; a doubled quote inside a quoted string is an escaped
 * quote. Throws a QuerySyntaxError for unbalanced parentheses or quotes.
 */
export function scanTopLevel(
  text: string,
  clause: QueryClause,
  onChar: (index: number) => number | void,
): void {
  let quote: string | null = null;
  let depth = 0;
  let i = 0;

  const unbalancedParens = () => clause === 'QUERY'
    ? new QuerySyntaxError(clause, 'Unbalanced parentheses in query')
    : new QuerySyntaxError(clause, `Mismatched parentheses in ${describe(clause)}`);

  while (i < text.length) {
    const char = text[i];

    if (quote) {
      if (char === quote) {
        if (text[i + 1] === quote) {
          i += 2;
          continue;
        }
        quote = null;
      }
      i++;
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth < 0) {
        throw unbalancedParens();
      }
    } else if (depth === 0) {
      const consumed = onChar(i);
      if (consumed) {
        i += consumed;
        continue;
      }
    }
    i++;
  }

  if (quote) {
    throw new QuerySyntaxError(clause, clause === 'QUERY'
      ? 'Unbalanced quotes in query'
      : `Unclosed quote in ${describe(clause)}`);
  }
  if (depth !== 0) {
    throw unbalancedParens();
  }
}

/**
 * Split text on commas that are outside quotes and parentheses.
 * Parts are trimmed; empty parts are kept so callers can report them.
 */
export function splitTopLevel(text: string, clause: QueryClause): string[] {
  const parts: string[] = [];
  let start = 0;

  scanTopLevel(text, clause, (i) => {
    if (text[i] === ',') {
      parts.push(text.slice(start, i).trim());
      start = i + 1;
    }
  });
  parts.push(text.slice(start).trim());

  return parts;
}

/**
 * Whether the character before `index` is a token boundary.
 */
export function atTokenStart(text: string, index: number): boolean {
  return index === 0 || /\s/.test(text[index - 1]);
}

/**
 * Split a query into its clause texts.
 *
 * Keywords are matched case-insensitively as whole whitespace-delimited tokens
 * outside quotes and parentheses; only the first occurrence of each counts.
 * A trailing `;` is ignored.
 */
export function extractClauses(query: string): ClauseSet {
  const text = query.trim().replace(/;+\s*$/, '').trim();
  if (!text) {
    throw new QuerySyntaxError('QUERY', 'Empty query');
  }

  const found: Array<{ key: ClauseKey; start: number; end: number }> = [];
  const seen = new Set<ClauseKey>();

  scanTopLevel(text, 'QUERY', (i) => {
    if (!atTokenStart(text, i)) return;

    KEYWORD_PATTERN.lastIndex = i;
    const match = KEYWORD_PATTERN.exec(text);
    if (!match) return;

    const key = keywordKey(match[1]);
    if (!seen.has(key)) {
      seen.add(key);
      found.push({ key, start: i, end: i + match[0].length });
    }
    return match[0].length;
  });

  if (found.length < 2 || found[0].key !== 'select' || found[0].start !== 0 || found[1].key !== 'from') {
    throw new QuerySyntaxError('QUERY', STRUCTURE_ERROR);
  }

  for (let i = 1; i < found.length; i++) {
    const prev = found[i - 1];
    const next = found[i];
    if (CLAUSE_ORDER.indexOf(next.key) < CLAUSE_ORDER.indexOf(prev.key)) {
      throw new QuerySyntaxError(CLAUSE_NAMES[next.key], `${CLAUSE_NAMES[next.key]} must come before ${CLAUSE_NAMES[prev.key]}`);
    }
  }

  const clauses: ClauseSet = { select: '', from: '' };
  found.forEach((entry, i) => {
    const end = i + 1 < found.length ? found[i + 1].start : text.length;
    clauses[entry.key] = text.slice(entry.end, end).trim();
  });

  if (!clauses.from) {
    throw new QuerySyntaxError('QUERY', STRUCTURE_ERROR);
  }
  if (!IDENTIFIER_PATTERN.test(clauses.from)) {
    throw new QuerySyntaxError('FROM', `Invalid table name: ${clauses.from}`);
  }

  return clauses;
}

function keywordKey(keyword: string): ClauseKey {
  switch (keyword.toUpperCase().replace(/\s+/g, ' ')) {
    case 'SELECT': return 'select';
    case 'FROM': return 'from';
    case 'WHERE': return 'where';
    case 'GROUP BY': return 'groupBy';
    case 'ORDER BY': return 'orderBy';
    default: return 'limit';
  }
}
