/**
 * Pipeline tests for QueryEngine.execute
 */

import { beforeEach, describe, expect, it } from '@jest/globals';
import { QueryEngine } from '../engine';
import type { PlainRow, QueryResponse, TableProvider } from '../types';
import { MockTableProvider, OBJECTS, SCENE } from './test-helpers';

function plainRows(response: QueryResponse): PlainRow[] {
  if (response.status !== 'success' || !Array.isArray(response.data)) {
    throw new Error(`Expected json rows, got ${JSON.stringify(response)}`);
  }
  return response.data;
}

function names(response: QueryResponse): unknown[] {
  return plainRows(response).map(row => row.name);
}

describe('QueryEngine.execute', () => {
  let engine: QueryEngine;
  let provider: MockTableProvider;

  beforeEach(() => {
    engine = new QueryEngine();
    provider = new MockTableProvider({ objects: OBJECTS, scene: SCENE });
  });

  describe('scenarios', () => {
    it('should group with COUNT(*) in first-seen order', () => {
      const response = engine.execute('SELECT type, COUNT(*) FROM objects GROUP BY type', 100, provider);

      expect(response).toEqual({
        status: 'success',
        format: 'json',
        count: 2,
        data: [
          { type: 'MESH', 'COUNT(*)': 2 },
          { type: 'LIGHT', 'COUNT(*)': 1 },
        ],
      });
    });

    it('should filter, order, limit and project', () => {
      const response = engine.execute("SELECT name FROM objects WHERE type = 'MESH' ORDER BY name DESC LIMIT 1", 100, provider);

      expect(response.status).toBe('success');
      expect(response.count).toBe(1);
      expect(response.data).toEqual([{ name: 'B' }]);
    });

    it('should name the SELECT clause in syntax errors', () => {
      const response = engine.execute('SELECT FROM objects', 100, provider);

      expect(response.status).toBe('error');
      expect(response.error).toBe('Query syntax error: SELECT clause error: Empty SELECT clause');
      expect(response.count).toBe(0);
      expect(response.data).toBeUndefined();
    });

    it('should list the known tables for an unknown table', () => {
      const response = engine.execute('SELECT * FROM unknown_table', 100, provider);

      expect(response.status).toBe('error');
      expect(response.error).toBe("Unknown table: 'unknown_table'. Available tables: objects, scene");
      expect(provider.fetches).toEqual([]);
    });

    it('should format CSV with rounded floats and empty nulls', () => {
      const numbers = new MockTableProvider({ numbers: [{ a: 1.1234567, b: null }] });
      const response = engine.execute('SELECT * FROM numbers', 100, numbers, 'csv');

      expect(response).toEqual({ status: 'success', format: 'csv', count: 1, data: 'a,b\n1.123457,\n' });
    });

    it('should combine AND and OR strictly left to right', () => {
      const response = engine.execute(
        "SELECT * FROM objects WHERE type = 'MESH' OR type = 'LIGHT' AND name = 'C'",
        100,
        provider,
      );

      expect(response.data).toEqual([{ name: 'C', type: 'LIGHT' }]);
    });
  });

  describe('formats', () => {
    it('should accept format names in any case and report them lowercased', () => {
      const response = engine.execute('SELECT name FROM objects', 100, provider, 'CSV');

      expect(response.format).toBe('csv');
      expect(response.data).toBe('name\nA\nB\nC\n');
    });

    it('should render tables', () => {
      const response = engine.execute('SELECT name, type FROM objects', 100, provider, 'table');

      expect(response.data).toBe([
        'name | type ',
        '------------',
        'A    | MESH ',
        'B    | MESH ',
        'C    | LIGHT',
      ].join('\n'));
    });

    it('should keep the fractional point of integral aggregate results', () => {
      const numbers = new MockTableProvider({ numbers: [{ v: 1 }, { v: 3 }] });
      const response = engine.execute('SELECT AVG(v) AS mean, COUNT(*) AS n FROM numbers', 100, numbers, 'csv');

      expect(response.data).toBe('mean,n\n2.0,2\n');
    });

    it('should reject unknown formats before parsing', () => {
      const response = engine.execute('not even a query', 100, provider, 'xml');

      expect(response).toEqual({
        status: 'error',
        format: 'xml',
        count: 0,
        error: 'Unknown format: xml. Available formats: json, csv, table',
      });
    });
  });

  describe('field validation', () => {
    it('should list available fields when a field is missing', () => {
      const response = engine.execute('SELECT nope FROM scene', 100, provider);

      expect(response.error).toBe(
        "Field 'nope' not found in table 'scene'. " +
        'Available fields: data, data.material, data.vertices, name, size, tags, type, visible',
      );
    });

    it('should project null for an alias over a missing field', () => {
      const response = engine.execute('SELECT name, nope AS n FROM objects', 100, provider);

      expect(response).toEqual({
        status: 'success',
        format: 'json',
        count: 3,
        data: [
          { name: 'A', n: null },
          { name: 'B', n: null },
          { name: 'C', n: null },
        ],
      });
    });

    it('should skip the check for empty tables', () => {
      const empty = new MockTableProvider({ empty: [] });
      const response = engine.execute('SELECT nope FROM empty', 100, empty);

      expect(response).toEqual({ status: 'success', format: 'json', count: 0, data: [] });
    });

    it('should only look at the first rows', () => {
      const data: PlainRow[] = [{ a: 1 }, { a: 2 }, { a: 3 }, { a: 4 }, { a: 5 }, { a: 6, late: true }];
      const late = new MockTableProvider({ t: data });

      expect(engine.execute('SELECT late FROM t', 100, late).status).toBe('error');
      expect(new QueryEngine({ fieldSampleRows: 10 }).execute('SELECT late FROM t', 100, late).count).toBe(6);
    });
  });

  describe('errors', () => {
    it('should wrap provider failures with the table name', () => {
      provider.failOn('scene', new Error('disk on fire'));
      const response = engine.execute('SELECT * FROM scene', 100, provider);

      expect(response.status).toBe('error');
      expect(response.error).toBe("Error loading data from table 'scene': disk on fire");
    });

    it('should never throw', () => {
      const broken: TableProvider = {
        hasTable: () => {
          throw new Error('boom');
        },
        getTableNames: () => new Set(),
        getRows: () => [],
      };
      const response = engine.execute('SELECT * FROM t', 100, broken);

      expect(response).toEqual({
        status: 'error',
        format: 'json',
        count: 0,
        error: 'Unexpected error executing query: boom',
      });
    });

    it('should report WHERE syntax errors', () => {
      const response = engine.execute("SELECT * FROM scene WHERE size >", 100, provider);

      expect(response.error).toBe('Query syntax error: WHERE clause error: Missing value in condition: size >');
    });
  });

  describe('ordering', () => {
    it('should sort nulls last in both directions', () => {
      const desc = engine.execute('SELECT name, size FROM scene ORDER BY size DESC', 100, provider);
      const asc = engine.execute('SELECT name, size FROM scene ORDER BY size', 100, provider);

      expect(names(desc)).toEqual(['Sun', 'Cone', 'Cube', 'Sphere', 'Camera']);
      expect(names(asc)).toEqual(['Sphere', 'Cube', 'Cone', 'Sun', 'Camera']);
    });

    it('should reverse a totally ordered field between ASC and DESC', () => {
      const asc = names(engine.execute('SELECT name FROM scene ORDER BY name ASC', 100, provider));
      const desc = names(engine.execute('SELECT name FROM scene ORDER BY name DESC', 100, provider));

      expect(asc).toEqual(['Camera', 'Cone', 'Cube', 'Sphere', 'Sun']);
      expect(desc).toEqual([...asc].reverse());
    });

    it('should keep input order for ties', () => {
      const response = engine.execute('SELECT name, type FROM scene ORDER BY type', 100, provider);

      expect(names(response)).toEqual(['Camera', 'Sun', 'Cube', 'Sphere', 'Cone']);
    });

    it('should order by an aliased aggregate call', () => {
      const response = engine.execute(
        'SELECT type, COUNT(*) AS n FROM scene GROUP BY type ORDER BY COUNT(*) DESC, type',
        100,
        provider,
      );

      expect(response.data).toEqual([
        { type: 'MESH', n: 3 },
        { type: 'CAMERA', n: 1 },
        { type: 'LIGHT', n: 1 },
      ]);
    });

    it('should order by a field alias', () => {
      const response = engine.execute('SELECT name AS label FROM scene ORDER BY label LIMIT 2', 100, provider);

      expect(response.data).toEqual([{ label: 'Camera' }, { label: 'Cone' }]);
    });
  });

  describe('limits', () => {
    it('should apply the smaller of the query LIMIT and the limit argument', () => {
      expect(engine.execute('SELECT * FROM scene LIMIT 2', 100, provider).count).toBe(2);
      expect(engine.execute('SELECT * FROM scene LIMIT 10', 3, provider).count).toBe(3);
    });

    it('should treat a limit argument of 0 as no limit', () => {
      expect(engine.execute('SELECT * FROM scene', 0, provider).count).toBe(5);
      expect(engine.execute('SELECT * FROM scene', -1, provider).count).toBe(5);
    });

    it('should honour LIMIT 0', () => {
      expect(engine.execute('SELECT * FROM scene LIMIT 0', 100, provider)).toEqual({
        status: 'success',
        format: 'json',
        count: 0,
        data: [],
      });
    });

    it('should never return more rows than asked for or than exist', () => {
      for (let n = 0; n <= 7; n++) {
        const response = engine.execute(`SELECT * FROM scene LIMIT ${n}`, 8192, provider);

        expect(response.count).toBeLessThanOrEqual(n);
        expect(response.count).toBeLessThanOrEqual(SCENE.length);
      }
    });

    it('should use the configured default limit', () => {
      const limited = new QueryEngine({ defaultLimit: 2 });

      expect(limited.execute('SELECT * FROM scene', undefined, provider).count).toBe(2);
    });
  });

  describe('shapes', () => {
    it('should return no rows for bare aggregates over an empty selection', () => {
      const response = engine.execute("SELECT COUNT(*) FROM scene WHERE type = 'NONE'", 100, provider);

      expect(response).toEqual({ status: 'success', format: 'json', count: 0, data: [] });
    });

    it('should compute bare aggregates over the whole selection', () => {
      const response = engine.execute("SELECT COUNT(*) AS n, SUM(data.vertices) AS v FROM scene WHERE type = 'MESH'", 100, provider);

      expect(response.data).toEqual([{ n: 3, v: 523 }]);
    });

    it('should deduplicate with DISTINCT', () => {
      const response = engine.execute('SELECT DISTINCT type FROM scene', 100, provider);

      expect(response.data).toEqual([{ type: 'MESH' }, { type: 'LIGHT' }, { type: 'CAMERA' }]);
    });

    it('should project nested fields by their path', () => {
      const response = engine.execute('SELECT name, data.vertices FROM scene WHERE data.vertices > 100', 100, provider);

      expect(response.data).toEqual([{ name: 'Sphere', 'data.vertices': 482 }]);
    });

    it('should group without aggregates', () => {
      const response = engine.execute('SELECT type FROM scene GROUP BY type', 100, provider);

      expect(response.data).toEqual([{ type: 'MESH' }, { type: 'LIGHT' }, { type: 'CAMERA' }]);
    });

    it('should produce one row per group and never more rows than input', () => {
      const response = engine.execute('SELECT visible, COUNT(*) FROM scene GROUP BY visible', 100, provider);

      expect(response.data).toEqual([
        { visible: true, 'COUNT(*)': 4 },
        { visible: false, 'COUNT(*)': 1 },
      ]);
      expect(response.count).toBeLessThanOrEqual(SCENE.length);
    });

    it('should keep BETWEEN conditions whole', () => {
      const response = engine.execute("SELECT name FROM scene WHERE size BETWEEN 2 AND 3 OR name = 'Sun'", 100, provider);

      expect(names(response)).toEqual(['Cube', 'Sun', 'Cone']);
    });

    it('should fetch the table once per query', () => {
      engine.execute('SELECT * FROM objects', 100, provider);

      expect(provider.fetches).toEqual(['objects']);
    });
  });
});
