import Handlebars from 'handlebars';
import { EngineConfig, EngineConfigInput, EngineConfigSchema } from './config';
import { QueryError, QueryExecutionError, TableFetchError, errorMessage } from './errors';
import { FormatFactory, normalizeFormat } from './formatters';
import { aggregateAll, columnReader, distinctRows, groupRows, projectRows } from './group';
import { logger } from './logger';
import { sortRows } from './order';
import { validateQuerySyntax } from './parser';
import { FieldInfo, analyzeFields, availableFields, describeFields, fieldExists } from './schema';
import {
  AGGREGATE_FUNCTIONS,
  OUTPUT_FORMATS,
  OrderSpec,
  OutputFormat,
  ParsedQuery,
  PlainRow,
  PlainValue,
  QueryResponse,
  Row,
  TableProvider,
} from './types';
import { bool, int, str } from './value';

/**
 * Schema of one table as returned by getTableSchema
 */
export interface TableSchema {
  table: string;
  description: string;
  fields: Record<string, FieldInfo>;
  /** Total number of rows in the table */
  sampleCount: number;
}

export interface TableInfo {
  name: string;
  description: string;
  count: number;
  fields: Record<string, FieldInfo>;
  fieldCount: number;
  /** Set when the table could not be loaded */
  error?: string;
}

export interface ComprehensiveSchema {
  status: 'success';
  format: OutputFormat;
  totalTables: number;
  totalElements: number;
  tables: TableInfo[];
  /** Flattened schema rendered as csv or table text */
  formattedContent?: PlainRow[] | string;
  flattenedRows?: number;
}

export interface SchemaError {
  status: 'error';
  error: string;
  format: string;
  tables: TableInfo[];
}

export interface SchemaOptions {
  format?: string;
  includeSamples?: boolean;
  maxSamples?: number;
}

export interface TableCounts {
  status: 'success';
  tableCounts: Record<string, number>;
  totalTables: number;
  totalElements: number;
  errors?: string[];
}

const SUMMARY_TEMPLATE = Handlebars.compile(
`# Available Tables

{{#if tables.length}}
{{#each tables}}
- **{{name}}**{{#if description}}: {{description}}{{/if}}
{{/each}}
{{else}}
No tables available.
{{/if}}

## Query Syntax

\`SELECT [DISTINCT] fields FROM table [WHERE conditions] [GROUP BY fields] [ORDER BY fields [ASC|DESC]] [LIMIT n]\`

- Fields may be nested paths such as \`data.location.x\`
- Operators: =, !=, <>, >, <, >=, <=, LIKE, ILIKE, IN, BETWEEN, IS NULL, IS NOT NULL (and NOT forms)
- Conditions combine strictly left to right: \`a OR b AND c\` means \`(a OR b) AND c\`
- Aggregates: {{aggregates}}
- Output formats: {{formats}}
{{#if example}}

## Examples

\`\`\`sql
SELECT * FROM {{example}} LIMIT 3
SELECT COUNT(*) AS total FROM {{example}}
\`\`\`
{{/if}}
`, { noEscape: true });

/**
 * Executes SQL-like queries against the tables of a TableProvider.
 *
 * `execute` never throws: every failure comes back as an error response
 * whose message names the stage that failed.
 */
export class QueryEngine {
  readonly config: EngineConfig;

  constructor(config: EngineConfigInput = {}) {
    this.config = EngineConfigSchema.parse(config);
    if (this.config.log.enabled) {
      logger.configure({ enabled: true, file: this.config.log.file });
    }
  }

  /**
   * Execute a query.
   *
   * @param limit - maximum rows returned; 0 or less means no limit. The
   *   query's own LIMIT applies as well, the smaller one wins. Defaults to
   *   `config.defaultLimit`.
   * @param format - `json`, `csv` or `table`, case-insensitive
   */
  execute(query: string, limit: number | undefined, provider: TableProvider, format: string = 'json'): QueryResponse {
    const started = performance.now();

    try {
      const response = this.run(query, limit ?? this.config.defaultLimit, provider, format);
      logger.log(`query ok (${response.count} rows, ${(performance.now() - started).toFixed(1)}ms): ${query}`);
      return response;
    } catch (error) {
      const message = error instanceof QueryExecutionError
        ? error.message
        : `Unexpected error executing query: ${errorMessage(error)}`;
      logger.log(`query failed: ${message}: ${query}`);
      return { status: 'error', format, count: 0, error: message };
    }
  }

  private run(query: string, limit: number, provider: TableProvider, format: string): QueryResponse {
    const outputFormat = normalizeFormat(format);
    if (!outputFormat) {
      throw new QueryExecutionError(`Unknown format: ${format}. Available formats: ${OUTPUT_FORMATS.join(', ')}`);
    }

    const check = validateQuerySyntax(query);
    if (!check.valid) {
      throw new QueryExecutionError(`Query syntax error: ${check.error}`);
    }
    const parsed = check.query;

    const rows = this.fetchRows(parsed.table, provider);
    this.checkFields(parsed, rows);

    const read = columnReader(parsed);
    let result = rows;

    if (!parsed.where.isEmpty()) {
      result = stage('WHERE clause error', () => result.filter(row => parsed.where.evaluate(row)));
    }

    if (parsed.groupBy.length > 0) {
      result = stage('GROUP BY error', () => groupRows(result, parsed.groupBy, parsed.aggregates));
    } else if (parsed.aggregates.size > 0) {
      result = stage('Aggregate error', () => aggregateAll(result, parsed.aggregates));
    }

    if (parsed.distinct && parsed.groupBy.length === 0) {
      result = stage('DISTINCT error', () => distinctRows(result, parsed.fields, read));
    }

    if (parsed.orderBy.length > 0) {
      const orderBy = parsed.orderBy.map(spec => ({ ...spec, field: orderColumn(parsed, spec) }));
      result = stage('ORDER BY error', () => sortRows(result, orderBy, read));
    }

    const max = effectiveLimit(parsed.limit, limit);
    if (max !== undefined) {
      result = result.slice(0, max);
    }

    if (!parsed.fields.includes('*') && parsed.aggregates.size === 0) {
      result = stage('Projection error', () => projectRows(result, parsed.fields, read));
    }

    const data = stage('Formatting error', () => FormatFactory.createFormatter(outputFormat).format(result));

    return { status: 'success', format: outputFormat, count: result.length, data };
  }

  private fetchRows(table: string, provider: TableProvider): Row[] {
    if (!provider.hasTable(table)) {
      throw new QueryExecutionError(unknownTableMessage(table, provider));
    }
    try {
      return provider.getRows(table);
    } catch (error) {
      throw new QueryExecutionError(new TableFetchError(table, error).message);
    }
  }

  /**
   * Every plain SELECT field must resolve in at least one of the first rows.
   * Aliases are not checked: an alias over a missing path projects null.
   * Skipped for empty tables and `*`.
   */
  private checkFields(parsed: ParsedQuery, rows: Row[]): void {
    if (rows.length === 0 || parsed.fields.includes('*')) {
      return;
    }

    const sample = rows.slice(0, this.config.fieldSampleRows);
    for (const field of parsed.fields) {
      if (parsed.aggregates.has(field) || parsed.aliases.has(field)) continue;
      if (fieldExists(field, sample)) continue;

      const suggestions = availableFields(rows.slice(0, this.config.suggestionSampleRows), this.config.suggestionDepth);
      throw new QueryExecutionError(
        `Field '${field}' not found in table '${parsed.table}'. ` +
        `Available fields: ${describeFields(suggestions, this.config.maxSuggestedFields)}`,
      );
    }
  }

  /**
   * Describe the fields of one table from its first rows.
   */
  getTableSchema(table: string, provider: TableProvider): TableSchema {
    if (!provider.hasTable(table)) {
      throw new QueryError(unknownTableMessage(table, provider));
    }

    let rows: Row[];
    try {
      rows = provider.getRows(table);
    } catch (error) {
      throw new TableFetchError(table, error);
    }

    return {
      table,
      description: provider.getTableDescription?.(table) ?? '',
      fields: analyzeFields(rows.slice(0, this.config.schemaSampleRows), {
        includeSamples: true,
        maxSamples: this.config.maxSampleValues,
      }),
      sampleCount: rows.length,
    };
  }

  /**
   * Describe every table. Tables that fail to load are reported with an
   * `error` instead of failing the call.
   */
  getComprehensiveSchema(provider: TableProvider, options: SchemaOptions = {}): ComprehensiveSchema | SchemaError {
    const { format = 'json', includeSamples = false, maxSamples = this.config.maxSampleValues } = options;

    const outputFormat = normalizeFormat(format);
    if (!outputFormat) {
      return {
        status: 'error',
        error: `Unknown format: ${format}. Available formats: ${OUTPUT_FORMATS.join(', ')}`,
        format,
        tables: [],
      };
    }

    const tables = sortedTableNames(provider).map((name): TableInfo => {
      const description = provider.getTableDescription?.(name) ?? '';
      try {
        const rows = provider.getRows(name);
        const fields = analyzeFields(rows, { includeSamples, maxSamples });
        return { name, description, count: rows.length, fields, fieldCount: Object.keys(fields).length };
      } catch (error) {
        logger.log(`schema: ${new TableFetchError(name, error).message}`);
        return { name, description, count: 0, fields: {}, fieldCount: 0, error: errorMessage(error) };
      }
    });

    const schema: ComprehensiveSchema = {
      status: 'success',
      format: outputFormat,
      totalTables: tables.length,
      totalElements: tables.reduce((total, table) => total + table.count, 0),
      tables,
    };

    if (outputFormat !== 'json') {
      const flattened = flattenSchema(tables);
      schema.formattedContent = FormatFactory.createFormatter(outputFormat).format(flattened);
      schema.flattenedRows = flattened.length;
    }

    return schema;
  }

  /**
   * Row count of every table. A table that fails to load counts as 0 and is
   * listed in `errors`.
   */
  getTableCounts(provider: TableProvider): TableCounts {
    const tableCounts: Record<string, number> = {};
    const errors: string[] = [];

    for (const name of sortedTableNames(provider)) {
      try {
        tableCounts[name] = provider.getRows(name).length;
      } catch (error) {
        errors.push(`Error getting count for table '${name}': ${errorMessage(error)}`);
        tableCounts[name] = 0;
      }
    }

    const counts: TableCounts = {
      status: 'success',
      tableCounts,
      totalTables: Object.keys(tableCounts).length,
      totalElements: Object.values(tableCounts).reduce((a, b) => a + b, 0),
    };
    if (errors.length > 0) {
      counts.errors = errors;
    }
    return counts;
  }

  /**
   * Markdown overview of the tables and the query language. Reads table
   * names and descriptions only, never rows.
   */
  getSchemaSummary(provider: TableProvider): string {
    const tables = sortedTableNames(provider).map(name => ({
      name,
      description: provider.getTableDescription?.(name) ?? '',
    }));

    return SUMMARY_TEMPLATE({
      tables,
      example: tables.find(table => table.name !== 'tables')?.name ?? tables[0]?.name,
      aggregates: AGGREGATE_FUNCTIONS.join(', '),
      formats: OUTPUT_FORMATS.join(', '),
    });
  }

  getSupportedFormats(): OutputFormat[] {
    return FormatFactory.getAvailableFormats();
  }
}

/**
 * Run a pipeline step, qualifying any error with the step's label.
 */
function stage<T>(label: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw new QueryExecutionError(`${label}: ${errorMessage(error)}`);
  }
}

function sortedTableNames(provider: TableProvider): string[] {
  return [...provider.getTableNames()].sort();
}

function unknownTableMessage(table: string, provider: TableProvider): string {
  return `Unknown table: '${table}'. Available tables: ${sortedTableNames(provider).join(', ')}`;
}

/**
 * The smaller of the query's LIMIT and the caller's limit; a caller limit of
 * 0 or less does not apply.
 */
export function effectiveLimit(queryLimit: number | null, limit: number): number | undefined {
  const limits: number[] = [];
  if (queryLimit !== null) limits.push(queryLimit);
  if (limit > 0) limits.push(limit);
  return limits.length > 0 ? Math.min(...limits) : undefined;
}

/**
 * Output column an ORDER BY item sorts on. An aggregate call such as
 * `COUNT(*)` maps to the alias it was given in the SELECT list.
 */
function orderColumn(query: ParsedQuery, spec: OrderSpec): string {
  if (query.aggregates.has(spec.field)) {
    return spec.field;
  }
  for (const [alias, source] of query.aliases) {
    if (source === spec.field && query.aggregates.has(alias)) {
      return alias;
    }
  }
  return spec.field;
}

function flattenSchema(tables: TableInfo[]): Row[] {
  const rows: Row[] = [];
  for (const table of tables) {
    for (const [fieldName, field] of Object.entries(table.fields)) {
      rows.push({
        table_name: str(table.name),
        table_description: str(table.description),
        table_count: int(table.count),
        field_name: str(fieldName),
        field_type: str(field.type),
        field_nullable: bool(field.nullable),
        sample_values: str(sampleText(field.sampleValues)),
      });
    }
  }
  return rows;
}

function sampleText(samples: PlainValue[] | undefined): string {
  return samples && samples.length > 0 ? JSON.stringify(samples) : '';
}
