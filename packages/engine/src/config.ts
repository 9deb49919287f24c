import fs from 'fs/promises';
import { z } from 'zod';
import { errorMessage } from './errors';

/**
 * Engine settings. Every field has a default, so `{}` is a valid config.
 */
export const EngineConfigSchema = z.object({
  defaultLimit: z.number().int().min(0).default(8192).describe('Row limit used when the caller passes none'),
  fieldSampleRows: z.number().int().min(1).default(5).describe('Rows checked when validating SELECT fields'),
  suggestionSampleRows: z.number().int().min(1).default(3).describe('Rows scanned for field suggestions'),
  suggestionDepth: z.number().int().min(0).default(3).describe('Nesting depth of suggested field paths'),
  maxSuggestedFields: z.number().int().min(1).default(20).describe('Field suggestions listed in an error'),
  schemaSampleRows: z.number().int().min(1).default(10).describe('Rows analysed by getTableSchema'),
  maxSampleValues: z.number().int().min(0).default(3).describe('Sample values kept per field'),
  log: z.object({
    enabled: z.boolean().default(false),
    file: z.string().default('./rowquery.log'),
  }).default({ enabled: false, file: './rowquery.log' }),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load engine settings from a JSON file. A missing file yields the defaults.
 */
export async function loadConfig(filePath: string): Promise<EngineConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return EngineConfigSchema.parse({});
    }
    throw new Error(`Failed to load ${filePath}: ${errorMessage(error)}`);
  }

  const parsed = EngineConfigSchema.safeParse(parseJson(filePath, content));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Failed to load ${filePath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function parseJson(filePath: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to load ${filePath}: ${errorMessage(error)}`);
  }
}
