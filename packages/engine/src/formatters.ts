import { QueryError } from './errors';
import { OUTPUT_FORMATS, OutputFormat, PlainRow, Row } from './types';
import { formatCell, rowToPlain } from './value';

/**
 * Renders result rows in one output format.
 */
export interface Formatter {
  readonly name: OutputFormat;
  format(rows: Row[]): PlainRow[] | string;
}

/**
 * Plain rows, left for the caller to serialize.
 */
export class JSONFormatter implements Formatter {
  readonly name = 'json';

  format(rows: Row[]): PlainRow[] {
    return rows.map(rowToPlain);
  }
}

function escapeCSV(text: string): string {
  if (text.includes(',') || text.includes('"') || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * CSV with a header taken from the keys of the first row. Lines end in `\n`
 * and null or missing values are empty cells.
 */
export class CSVFormatter implements Formatter {
  readonly name = 'csv';

  format(rows: Row[]): string {
    if (rows.length === 0) {
      return '';
    }

    const columns = Object.keys(rows[0]);
    const lines = [
      columns.map(escapeCSV).join(','),
      ...rows.map(row => columns.map(col => escapeCSV(formatCell(row[col]))).join(',')),
    ];

    return `${lines.join('\n')}\n`;
  }
}

/**
 * Fixed width text table: header, a dash line as wide as the header, then
 * one line per row with columns joined by ` | `.
 */
export class TableFormatter implements Formatter {
  readonly name = 'table';

  format(rows: Row[]): string {
    if (rows.length === 0) {
      return 'No data';
    }

    const columns = Object.keys(rows[0]);
    const cells = rows.map(row => columns.map(col => formatCell(row[col])));
    const widths = columns.map((col, i) =>
      cells.reduce((width, line) => Math.max(width, line[i].length), col.length),
    );

    const header = columns.map((col, i) => col.padEnd(widths[i])).join(' | ');
    const separator = '-'.repeat(header.length);
    const body = cells.map(line => line.map((cell, i) => cell.padEnd(widths[i])).join(' | '));

    return [header, separator, ...body].join('\n');
  }
}

/**
 * Whether `name` is a supported output format (case-insensitive).
 */
export function isOutputFormat(name: string): boolean {
  return normalizeFormat(name) !== undefined;
}

/**
 * The canonical name of a format, or undefined when unsupported.
 */
export function normalizeFormat(name: string): OutputFormat | undefined {
  const lower = name.toLowerCase();
  return OUTPUT_FORMATS.find(format => format === lower);
}

/**
 * Creates formatters by name.
 */
export class FormatFactory {
  static createFormatter(name: string): Formatter {
    switch (normalizeFormat(name)) {
      case 'json':
        return new JSONFormatter();
      case 'csv':
        return new CSVFormatter();
      case 'table':
        return new TableFormatter();
      default:
        throw new QueryError(`Unknown format: ${name}. Available formats: ${OUTPUT_FORMATS.join(', ')}`);
    }
  }

  static getAvailableFormats(): OutputFormat[] {
    return [...OUTPUT_FORMATS];
  }
}
