import { extractClauses } from './clauses';
import { WhereExpression } from './condition';
import { QuerySyntaxError, errorMessage } from './errors';
import { parseOrderBy } from './order';
import { parseGroupBy, parseLimit, parseSelect } from './select';
import type { ParsedQuery } from './types';
import { parseWhere } from './where';

/**
 * Outcome of a syntax check
 */
export type SyntaxCheck =
  | { valid: true; query: ParsedQuery }
  | { valid: false; error: string };

/**
 * Parse query text into a ParsedQuery. Throws QuerySyntaxError naming the
 * offending clause.
 */
export function parseQuery(query: string): ParsedQuery {
  const clauses = extractClauses(query);
  const select = parseSelect(clauses.select);

  return {
    ...select,
    table: clauses.from,
    where: clauses.where !== undefined ? parseWhere(clauses.where) : new WhereExpression(),
    groupBy: clauses.groupBy !== undefined ? parseGroupBy(clauses.groupBy) : [],
    orderBy: clauses.orderBy !== undefined ? parseOrderBy(clauses.orderBy) : [],
    limit: clauses.limit !== undefined ? parseLimit(clauses.limit) : null,
  };
}

/**
 * Message for a syntax error, qualified by its clause:
 * `SELECT clause error: Empty SELECT clause`.
 */
export function syntaxErrorMessage(error: unknown): string {
  if (error instanceof QuerySyntaxError && error.clause !== 'QUERY') {
    return `${error.clause} clause error: ${error.message}`;
  }
  return errorMessage(error);
}

/**
 * Check a query without executing it.
 */
export function validateQuerySyntax(query: string): SyntaxCheck {
  try {
    return { valid: true, query: parseQuery(query) };
  } catch (error) {
    return { valid: false, error: syntaxErrorMessage(error) };
  }
}
