import { describe, expect, it } from '@jest/globals';
import {
  NULL,
  bool,
  compareLoose,
  compareValues,
  float,
  formatCell,
  friendlyTypeName,
  fromPlain,
  int,
  list,
  lookupPath,
  map,
  num,
  parseNumber,
  parsePlain,
  resolvePath,
  rowFromPlain,
  str,
  toPlain,
  tupleKey,
  valueToText,
  valuesEqual,
} from '../value';

describe('Value model', () => {
  describe('plain conversion', () => {
    it('should map JSON numbers to int or float', () => {
      expect(fromPlain(3)).toEqual({ kind: 'int', value: 3 });
      expect(fromPlain(3.5)).toEqual({ kind: 'float', value: 3.5 });
      expect(num(-2)).toEqual({ kind: 'int', value: -2 });
    });

    it('should convert nested structures both ways', () => {
      const plain = { a: [1, 'x', null], b: { c: true } };
      const value = fromPlain(plain);

      expect(value.kind).toBe('map');
      expect(toPlain(value)).toEqual(plain);
    });

    it('should reject values that are not JSON-compatible', () => {
      expect(() => parsePlain(undefined)).toThrow();
      expect(() => parsePlain({ fn: () => 1 })).toThrow();
      expect(parsePlain(['a'])).toEqual(list([str('a')]));
    });

    it('should truncate int values', () => {
      expect(int(2.9)).toEqual({ kind: 'int', value: 2 });
    });
  });

  describe('resolvePath', () => {
    const row = rowFromPlain({ name: 'Cube', data: { location: { x: 1 }, empty: null }, list: [1] });

    it('should resolve top level and nested paths', () => {
      expect(resolvePath(row, 'name')).toEqual(str('Cube'));
      expect(resolvePath(row, 'data.location.x')).toEqual(int(1));
      expect(resolvePath(row, 'data.empty')).toEqual(NULL);
    });

    it('should return undefined when a segment is missing', () => {
      expect(resolvePath(row, 'missing')).toBeUndefined();
      expect(resolvePath(row, 'data.location.y')).toBeUndefined();
      expect(resolvePath(row, 'name.length')).toBeUndefined();
      expect(resolvePath(row, 'list.0')).toBeUndefined();
    });

    it('should not see inherited properties', () => {
      expect(resolvePath(row, 'toString')).toBeUndefined();
      expect(resolvePath(row, 'data.constructor')).toBeUndefined();
    });

    it('should treat missing paths as null in lookupPath', () => {
      expect(lookupPath(row, 'nope.nope')).toEqual(NULL);
    });
  });

  describe('parseNumber', () => {
    it('should parse ints and floats', () => {
      expect(parseNumber('42')).toEqual(int(42));
      expect(parseNumber('-7')).toEqual(int(-7));
      expect(parseNumber('3.25')).toEqual(float(3.25));
      expect(parseNumber('1e3')).toEqual(float(1000));
      expect(parseNumber('.5')).toEqual(float(0.5));
    });

    it('should return undefined for non-numbers', () => {
      expect(parseNumber('abc')).toBeUndefined();
      expect(parseNumber('1.2.3')).toBeUndefined();
      expect(parseNumber('')).toBeUndefined();
      expect(parseNumber('12px')).toBeUndefined();
    });
  });

  describe('equality and ordering', () => {
    it('should compare ints and floats numerically', () => {
      expect(valuesEqual(int(3), float(3))).toBe(true);
      expect(compareValues(int(2), float(2.5))).toBe(-1);
    });

    it('should not equate different kinds', () => {
      expect(valuesEqual(str('1'), int(1))).toBe(false);
      expect(valuesEqual(bool(true), int(1))).toBe(false);
      expect(valuesEqual(NULL, str(''))).toBe(false);
    });

    it('should compare lists and maps structurally', () => {
      expect(valuesEqual(list([int(1), str('a')]), list([float(1), str('a')]))).toBe(true);
      expect(valuesEqual(map({ a: int(1), b: int(2) }), map({ b: int(2), a: int(1) }))).toBe(true);
      expect(valuesEqual(map({ a: int(1) }), map({ a: int(1), b: NULL }))).toBe(false);
    });

    it('should have no natural order across kinds', () => {
      expect(compareValues(int(1), str('1'))).toBeUndefined();
      expect(compareValues(NULL, int(1))).toBeUndefined();
    });

    it('should fall back to text order in compareLoose', () => {
      expect(compareLoose(int(10), str('9'))).toBe(-1);
      expect(compareLoose(str('b'), str('a'))).toBe(1);
    });
  });

  describe('text forms', () => {
    it('should render values as text', () => {
      expect(valueToText(NULL)).toBe('null');
      expect(valueToText(bool(false))).toBe('false');
      expect(valueToText(float(2.5))).toBe('2.5');
      expect(valueToText(fromPlain({ a: [1] }))).toBe('{"a":[1]}');
    });

    it('should round floats to six places in cells', () => {
      expect(formatCell(float(1.1234567))).toBe('1.123457');
      expect(formatCell(float(3))).toBe('3.0');
      expect(formatCell(float(2.0000001))).toBe('2.0');
      expect(formatCell(float(-4))).toBe('-4.0');
      expect(formatCell(float(1e21))).toBe('1e+21');
      expect(formatCell(int(3))).toBe('3');
      expect(formatCell(NULL)).toBe('');
      expect(formatCell(undefined)).toBe('');
      expect(formatCell(list([int(1), int(2)]))).toBe('[1,2]');
    });
  });

  describe('tupleKey', () => {
    it('should give equal values the same key', () => {
      expect(tupleKey([int(1), str('a')])).toBe(tupleKey([float(1), str('a')]));
      expect(tupleKey([map({ a: int(1), b: int(2) })])).toBe(tupleKey([map({ b: int(2), a: int(1) })]));
    });

    it('should separate kinds', () => {
      expect(tupleKey([str('1')])).not.toBe(tupleKey([int(1)]));
      expect(tupleKey([NULL])).not.toBe(tupleKey([str('null')]));
    });
  });

  describe('friendlyTypeName', () => {
    it('should name every kind', () => {
      expect(friendlyTypeName(NULL)).toBe('null');
      expect(friendlyTypeName(bool(true))).toBe('boolean');
      expect(friendlyTypeName(int(1))).toBe('integer');
      expect(friendlyTypeName(float(1.5))).toBe('float');
      expect(friendlyTypeName(str('x'))).toBe('string');
      expect(friendlyTypeName(list([]))).toBe('array');
      expect(friendlyTypeName(list([str('a')]))).toBe('array[string]');
      expect(friendlyTypeName(map({}))).toBe('object');
    });
  });
});
