import { z } from 'zod';
import type { PlainRow, Row, TableProvider } from './types';
import { PlainRowSchema, rowFromPlain, str } from './value';

/**
 * Name of the meta-table listing every table a StaticTableProvider holds.
 */
export const TABLES_TABLE = 'tables';

export const TableDefinitionSchema = z.object({
  description: z.string().optional(),
  rows: z.array(PlainRowSchema),
});

/**
 * Tables as plain data: either a bare row array or `{ description, rows }`.
 */
export const TableDataSchema = z.record(
  z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Table names must be identifiers'),
  z.union([z.array(PlainRowSchema), TableDefinitionSchema]),
);

export type TableData = z.infer<typeof TableDataSchema>;

interface StoredTable {
  description?: string;
  rows: PlainRow[];
}

/**
 * A TableProvider over in-memory plain data, validated on construction.
 *
 * Every `getRows` call converts the stored rows afresh, so callers can never
 * change what a later query sees. A `tables` meta-table with one row per table
 * (`table`, `description`), itself included, is added unless the data defines
 * its own.
 */
export class StaticTableProvider implements TableProvider {
  private readonly tables = new Map<string, StoredTable>();

  constructor(data: unknown) {
    const parsed = TableDataSchema.parse(data);
    for (const [name, table] of Object.entries(parsed)) {
      this.tables.set(name, Array.isArray(table) ? { rows: table } : table);
    }
  }

  hasTable(name: string): boolean {
    return this.tables.has(name) || name === TABLES_TABLE;
  }

  getTableNames(): Set<string> {
    return new Set([...this.tables.keys(), TABLES_TABLE]);
  }

  getRows(name: string): Row[] {
    const table = this.tables.get(name);
    if (table) {
      return table.rows.map(rowFromPlain);
    }
    if (name === TABLES_TABLE) {
      return this.metaRows();
    }
    throw new Error(`Unknown table: ${name}`);
  }

  getTableDescription(name: string): string | undefined {
    if (!this.tables.has(name) && name === TABLES_TABLE) {
      return 'Every available table';
    }
    return this.tables.get(name)?.description;
  }

  private metaRows(): Row[] {
    return [...this.getTableNames()].sort().map(name => ({
      table: str(name),
      description: str(this.getTableDescription(name) ?? ''),
    }));
  }
}
