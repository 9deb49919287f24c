/**
 * Error types raised inside the engine. None of them escape
 * `QueryEngine.execute`; they are turned into error responses there.
 */

/**
 * The clause a syntax error belongs to
 */
export type QueryClause = 'QUERY' | 'SELECT' | 'FROM' | 'WHERE' | 'GROUP BY' | 'ORDER BY' | 'LIMIT';

/**
 * Base error class for engine errors.
 */
export class QueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryError';
  }
}

/**
 * Error thrown when a query (or one of its clauses) is malformed.
 *
 * @example
 * ```typescript
 * throw new QuerySyntaxError('SELECT', 'Empty SELECT clause');
 * ```
 */
export class QuerySyntaxError extends QueryError {
  constructor(
    public clause: QueryClause,
    message: string,
  ) {
    super(message);
    this.name = 'QuerySyntaxError';
  }
}

/**
 * Error thrown when a table provider fails to return rows.
 */
export class TableFetchError extends QueryError {
  constructor(
    public table: string,
    public reason: unknown,
  ) {
    super(`Error loading data from table '${table}': ${errorMessage(reason)}`);
    this.name = 'TableFetchError';
  }
}

/**
 * Message of anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Error raised by a pipeline step. Its message is the final, stage qualified
 * text of the error response.
 */
export class QueryExecutionError extends QueryError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryExecutionError';
  }
}
