import { z } from 'zod';
import { QueryEngine } from './engine';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { TableProvider } from './types';

export const QueryToolInput = z.object({
  expr: z.string().default('').describe('Query text, e.g. SELECT name FROM objects WHERE type = \'MESH\''),
  limit: z.number().int().optional().describe('Maximum rows returned, 0 for no limit'),
  format: z.string().default('json').describe('Output format: json, csv or table'),
});

export const TableSchemaToolInput = z.object({
  table: z.string().min(1).describe('Table to describe'),
});

export const TableCountsToolInput = z.object({});

/**
 * `[success, { result }]`
 */
export type ToolCallResult = [boolean, { result: unknown }];

type ToolHandler = (args: unknown, provider: TableProvider, engine: QueryEngine) => ToolCallResult;

function invalidArguments(tool: string, error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ToolCallResult {
  const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return [false, { result: `Invalid arguments for ${tool}: ${issues.join('; ')}` }];
}

const TOOLS: Record<string, ToolHandler> = {
  query: (args, provider, engine) => {
    const input = QueryToolInput.safeParse(args ?? {});
    if (!input.success) {
      return invalidArguments('query', input.error);
    }
    if (!input.data.expr) {
      return [false, { result: 'No query provided' }];
    }

    const { expr, limit, format } = input.data;
    const result = engine.execute(expr, limit ?? engine.config.defaultLimit, provider, format);
    return [result.status === 'success', { result }];
  },

  table_counts: (args, provider, engine) => {
    const input = TableCountsToolInput.safeParse(args ?? {});
    if (!input.success) {
      return invalidArguments('table_counts', input.error);
    }
    return [true, { result: engine.getTableCounts(provider) }];
  },

  table_schema: (args, provider, engine) => {
    const input = TableSchemaToolInput.safeParse(args ?? {});
    if (!input.success) {
      return invalidArguments('table_schema', input.error);
    }
    return [true, { result: engine.getTableSchema(input.data.table, provider) }];
  },
};

/**
 * Names of the tools handleToolCall understands
 */
export function getToolNames(): string[] {
  return Object.keys(TOOLS);
}

/**
 * Dispatch a tool call by name. Never throws; failures come back as
 * `[false, { result: message }]`.
 */
export function handleToolCall(
  name: string,
  args: unknown,
  provider: TableProvider,
  engine: QueryEngine = new QueryEngine(),
): ToolCallResult {
  const handler = Object.hasOwn(TOOLS, name) ? TOOLS[name] : undefined;
  if (!handler) {
    return [false, { result: `Unknown tool: ${name}` }];
  }

  try {
    return handler(args, provider, engine);
  } catch (error) {
    logger.log(`Error in tool '${name}': ${errorMessage(error)}`);
    return [false, { result: `${name} error: ${errorMessage(error)}` }];
  }
}
