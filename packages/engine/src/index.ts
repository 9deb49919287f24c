/**
 * @rowquery/engine
 *
 * SQL-like queries over tables of dynamic rows.
 */

export * from './types';
export * from './errors';
export * from './value';
export { extractClauses, splitTopLevel } from './clauses';
export type { ClauseSet } from './clauses';
export { parseLiteral, parseLiteralList, unescapeString } from './literal';
export { aggregateLabel, isValidFieldPath, parseAggregateCall, parseGroupBy, parseLimit, parseSelect } from './select';
export { WhereCondition, WhereExpression, coerceLiteral, likeToRegExp } from './condition';
export { parseCondition, parseWhere, splitConditions } from './where';
export { parseOrderBy, sortRows } from './order';
export { parseQuery, syntaxErrorMessage, validateQuerySyntax } from './parser';
export type { SyntaxCheck } from './parser';
export { applyAggregate, numericSample } from './aggregate';
export { aggregateAll, columnReader, distinctRows, fieldValue, groupRows, projectRows } from './group';
export type { ColumnReader } from './group';
export { CSVFormatter, FormatFactory, JSONFormatter, TableFormatter, isOutputFormat, normalizeFormat } from './formatters';
export type { Formatter } from './formatters';
export { analyzeFields, availableFields, describeFields, fieldExists } from './schema';
export type { AnalyzeOptions, FieldInfo } from './schema';
export { EngineConfigSchema, loadConfig } from './config';
export type { EngineConfig, EngineConfigInput } from './config';
export { logger } from './logger';
export type { LoggerOptions } from './logger';
export { StaticTableProvider, TABLES_TABLE, TableDataSchema, TableDefinitionSchema } from './providers';
export type { TableData } from './providers';
export { QueryEngine, effectiveLimit } from './engine';
export type { ComprehensiveSchema, SchemaError, SchemaOptions, TableCounts, TableInfo, TableSchema } from './engine';
export { QueryToolInput, TableCountsToolInput, TableSchemaToolInput, getToolNames, handleToolCall } from './tool';
export type { ToolCallResult } from './tool';
