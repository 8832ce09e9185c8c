import { InvalidPathError } from '../../src/errors/invalid-path.error';
import {
  getPath,
  isValidPath,
  parsePath,
  setPath,
} from '../../src/utils/json-path';

describe('json-path', () => {
  describe('parsePath', () => {
    it('should parse the root path to no segments', () => {
      expect(parsePath('$')).toEqual([]);
    });

    it('should parse dot fields, indices and quoted fields', () => {
      expect(parsePath("$.order.items[2]['unit price']")).toEqual([
        'order',
        'items',
        2,
        'unit price',
      ]);
    });

    it('should reject paths that do not start at the root', () => {
      expect(() => parsePath('order.id')).toThrow(InvalidPathError);
    });

    it('should reject malformed segments', () => {
      expect(isValidPath('$.')).toBe(false);
      expect(isValidPath('$[x]')).toBe(false);
      expect(isValidPath('$..a')).toBe(false);
      expect(isValidPath('$.a[0].b')).toBe(true);
    });
  });

  describe('getPath', () => {
    const value = { a: { b: [10, { c: 'deep' }] }, nothing: null };

    it('should return the whole value for the root path', () => {
      expect(getPath(value, '$')).toEqual({ found: true, value });
    });

    it('should read nested fields and array elements', () => {
      expect(getPath(value, '$.a.b[1].c')).toEqual({ found: true, value: 'deep' });
      expect(getPath(value, '$.a.b[0]')).toEqual({ found: true, value: 10 });
    });

    it('should distinguish a null value from a missing one', () => {
      expect(getPath(value, '$.nothing')).toEqual({ found: true, value: null });
      expect(getPath(value, '$.missing')).toEqual({ found: false });
    });

    it('should report out-of-range indices and non-object parents as missing', () => {
      expect(getPath(value, '$.a.b[5]')).toEqual({ found: false });
      expect(getPath(value, '$.a.b[0].x')).toEqual({ found: false });
      expect(getPath(value, '$.a[0]')).toEqual({ found: false });
    });

    it('should not read inherited properties', () => {
      expect(getPath({}, '$.toString')).toEqual({ found: false });
    });
  });

  describe('setPath', () => {
    it('should replace the whole value at the root path', () => {
      expect(setPath({ a: 1 }, '$', { b: 2 })).toEqual({ b: 2 });
    });

    it('should create missing intermediate maps', () => {
      expect(setPath({ a: 1 }, '$.x.y.z', true)).toEqual({
        a: 1,
        x: { y: { z: true } },
      });
    });

    it('should replace a non-object intermediate with a map', () => {
      expect(setPath({ a: 'text' }, '$.a.b', 1)).toEqual({ a: { b: 1 } });
      expect(setPath(42, '$.a', 1)).toEqual({ a: 1 });
    });

    it('should write into an existing array slot', () => {
      expect(setPath({ list: [1, 2, 3] }, '$.list[1]', 'two')).toEqual({
        list: [1, 'two', 3],
      });
    });

    it('should refuse to create a missing array slot', () => {
      expect(() => setPath({ list: [1] }, '$.list[3]', 0)).toThrow(
        InvalidPathError,
      );
      expect(() => setPath({ list: {} }, '$.list[0]', 0)).toThrow(
        'array index 0 does not exist',
      );
    });

    it('should leave the original value untouched', () => {
      const original = { a: { b: 1 } };
      const updated = setPath(original, '$.a.c', 2);

      expect(original).toEqual({ a: { b: 1 } });
      expect(updated).toEqual({ a: { b: 1, c: 2 } });
    });
  });
});
