import { describe, expect, it } from '@jest/globals';
import { CSVFormatter, FormatFactory, JSONFormatter, TableFormatter, isOutputFormat } from '../formatters';
import { QueryError } from '../errors';
import { rows } from './test-helpers';

/**
 * Minimal CSV reader for unquoted content
 */
function parseCSV(text: string): Array<Record<string, string>> {
  const [header, ...lines] = text.trimEnd().split('\n');
  const columns = header.split(',');
  return lines.map(line => {
    const cells = line.split(',');
    return Object.fromEntries(columns.map((col, i) => [col, cells[i]]));
  });
}

describe('Formatters', () => {
  describe('JSON', () => {
    it('should return plain rows', () => {
      const data = rows([{ a: 1, b: [true, null], c: { d: 'x' } }]);

      expect(new JSONFormatter().format(data)).toEqual([{ a: 1, b: [true, null], c: { d: 'x' } }]);
    });
  });

  describe('CSV', () => {
    const csv = new CSVFormatter();

    it('should round floats and blank nulls', () => {
      expect(csv.format(rows([{ a: 1.1234567, b: null }]))).toBe('a,b\n1.123457,\n');
    });

    it('should return an empty string for no rows', () => {
      expect(csv.format([])).toBe('');
    });

    it('should serialize structured values as JSON and quote them when needed', () => {
      expect(csv.format(rows([{ tags: ['a', 'b'], note: 'say "hi"' }]))).toBe(
        'tags,note\n"[""a"",""b""]","say ""hi"""\n',
      );
    });

    it('should take the header from the first row', () => {
      expect(csv.format(rows([{ a: 1 }, { a: 2, b: 3 }, { b: 4 }]))).toBe('a\n1\n2\n\n');
    });

    it('should read back scalar values', () => {
      const data = [
        { name: 'Cube', count: 8, kind: 'MESH' },
        { name: 'Sun', count: 0, kind: 'LIGHT' },
      ];

      expect(parseCSV(csv.format(rows(data)))).toEqual([
        { name: 'Cube', count: '8', kind: 'MESH' },
        { name: 'Sun', count: '0', kind: 'LIGHT' },
      ]);
    });
  });

  describe('Table', () => {
    const table = new TableFormatter();

    it('should pad columns to the widest value', () => {
      const text = table.format(rows([
        { name: 'Cube', size: 2 },
        { name: 'Sphere', size: 1.5 },
        { name: 'Camera', size: null },
      ]));

      expect(text.split('\n')).toEqual([
        'name   | size',
        '-------------',
        'Cube   | 2   ',
        'Sphere | 1.5 ',
        'Camera |     ',
      ]);
    });

    it('should say so when there is no data', () => {
      expect(table.format([])).toBe('No data');
    });
  });

  describe('FormatFactory', () => {
    it('should create formatters case-insensitively', () => {
      expect(FormatFactory.createFormatter('CSV')).toBeInstanceOf(CSVFormatter);
      expect(FormatFactory.createFormatter('table').name).toBe('table');
      expect(isOutputFormat('Json')).toBe(true);
      expect(isOutputFormat('xml')).toBe(false);
    });

    it('should reject unknown formats', () => {
      expect(() => FormatFactory.createFormatter('xml')).toThrow(QueryError);
      expect(() => FormatFactory.createFormatter('xml')).toThrow('Unknown format: xml. Available formats: json, csv, table');
    });

    it('should list the formats', () => {
      expect(FormatFactory.getAvailableFormats()).toEqual(['json', 'csv', 'table']);
    });
  });
});
