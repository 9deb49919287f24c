import * as clack from '@clack/prompts';
import fs from 'fs/promises';
import { parseArgs } from 'util';
import { z } from 'zod';
import {
  EngineConfig,
  EngineConfigSchema,
  QueryEngine,
  StaticTableProvider,
  errorMessage,
  loadConfig,
  logger,
} from '@rowquery/engine';

export const USAGE = `Usage: rowquery <data.json> [query] [options]
       rowquery <data.json> [options] -- <query>

Quote the query, or put it after --, when it holds a token that starts with
a dash, such as a negative number.

Options:
  -f, --format <format>   Output format: json, csv or table (default json)
  -l, --limit <n>         Maximum rows returned, 0 for no limit
      --tables            Print the row count of every table
      --schema <table>    Print the schema of a table
      --summary           Print a Markdown summary of the tables
  -c, --config <file>     Engine settings (JSON)
      --log               Write a log file
  -h, --help              Show this help`;

/**
 * Where the CLI sends its output
 */
export interface CliIO {
  /** Command output: query results, schemas, counts */
  write(text: string): void;
  info(message: string): void;
  error(message: string): void;
}

export const clackIO: CliIO = {
  write: (text) => {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  },
  info: (message) => clack.log.info(message),
  error: (message) => clack.log.error(message),
};

export const CliOptionsSchema = z.object({
  dataFile: z.string().min(1).optional(),
  query: z.string().optional(),
  format: z.string().default('json'),
  limit: z.string().regex(/^-?\d+$/, 'limit must be an integer').transform(Number).optional(),
  tables: z.boolean().default(false),
  schema: z.string().min(1).optional(),
  summary: z.boolean().default(false),
  config: z.string().min(1).optional(),
  log: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parse command line arguments. Everything after the data file is joined
 * into the query, so it may be given unquoted; tokens after `--` are never
 * read as options.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      format: { type: 'string', short: 'f' },
      limit: { type: 'string', short: 'l' },
      tables: { type: 'boolean' },
      schema: { type: 'string' },
      summary: { type: 'boolean' },
      config: { type: 'string', short: 'c' },
      log: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const parsed = CliOptionsSchema.safeParse({
    ...values,
    dataFile: positionals[0],
    query: positionals.slice(1).join(' ') || undefined,
  });
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }
  return parsed.data;
}

/**
 * Load tables from a JSON data file: `{ "table": [rows...] }` or
 * `{ "table": { "description": "...", "rows": [...] } }`.
 */
export async function loadTables(filePath: string): Promise<StaticTableProvider> {
  const content = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid data file ${filePath}: ${errorMessage(error)}`);
  }

  try {
    return new StaticTableProvider(data);
  } catch (error) {
    const message = error instanceof z.ZodError ? z.prettifyError(error) : errorMessage(error);
    throw new Error(`Invalid data file ${filePath}: ${message}`);
  }
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value, null, 2);
}

async function run(options: CliOptions, dataFile: string, io: CliIO): Promise<number> {
  const config: EngineConfig = options.config
    ? await loadConfig(options.config)
    : EngineConfigSchema.parse({});
  if (options.log) {
    config.log.enabled = true;
  }

  const engine = new QueryEngine(config);
  const provider = await loadTables(dataFile);

  if (options.tables) {
    io.write(toText(engine.getTableCounts(provider)));
    return 0;
  }
  if (options.schema) {
    io.write(toText(engine.getTableSchema(options.schema, provider)));
    return 0;
  }
  if (options.summary) {
    io.write(engine.getSchemaSummary(provider));
    return 0;
  }
  if (!options.query) {
    io.error('No query provided');
    io.info(USAGE);
    return 1;
  }

  const response = engine.execute(options.query, options.limit ?? config.defaultLimit, provider, options.format);
  if (response.status === 'error') {
    io.error(response.error ?? 'Query failed');
    return 1;
  }

  io.write(toText(response.data ?? []));
  io.info(`${response.count} ${response.count === 1 ? 'row' : 'rows'}`);
  return 0;
}

/**
 * Run the CLI and return its exit code.
 */
export async function runCli(argv: string[], io: CliIO = clackIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    io.error(errorMessage(error));
    io.info(USAGE);
    return 1;
  }

  if (options.help) {
    io.write(USAGE);
    return 0;
  }
  if (!options.dataFile) {
    io.error('Missing data file');
    io.info(USAGE);
    return 1;
  }

  const restoreConsole = options.log ? logger.captureConsole() : undefined;
  try {
    return await run(options, options.dataFile, io);
  } catch (error) {
    io.error(errorMessage(error));
    return 1;
  } finally {
    restoreConsole?.();
    await logger.close();
  }
}
