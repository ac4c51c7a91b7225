import { describe, expect, it } from 'vitest';
import { JsonReader } from '../../src/ndplot/arrays/readers/JsonReader.ts';
import type { ArrayReader } from '../../src/ndplot/arrays/readers/types.ts';

const reader: ArrayReader = new JsonReader();
const read = (text: string) => reader.read(new TextEncoder().encode(text), 'data.json');

describe('JsonReader', () => {
  it('claims .json paths only', () => {
    const head = new Uint8Array();
    expect(reader.canRead('data.json', head)).toBe(true);
    expect(reader.canRead('DATA.JSON', head)).toBe(true);
    expect(reader.canRead('data.npy', head)).toBe(false);
  });

  it('reads nested lists as a row-major float64 array', () => {
    const array = read('[[1, 2, 3], [4, 5, 6]]');

    expect(array.shape).toEqual([2, 3]);
    expect(array.dtype).toBe('float64');
    expect(Array.from(array.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('reads a bare number as a 0-d array', () => {
    const array = read('2.5');
    expect(array.shape).toEqual([]);
    expect(Array.from(array.data)).toEqual([2.5]);
  });

  it('reads an empty list with shape (0)', () => {
    const array = read('[]');
    expect(array.shape).toEqual([0]);
    expect(array.data.length).toBe(0);
  });

  it('checks the shape of deeply nested lists in linear time', { timeout: 10_000 }, () => {
    // 18 levels of pairs: 262144 elements
    const depth = 18;
    const pairs = (level: number): unknown => (level === 0 ? 1 : [pairs(level - 1), pairs(level - 1)]);
    const array = read(JSON.stringify(pairs(depth)));

    expect(array.shape).toEqual(new Array<number>(depth).fill(2));
    expect(array.data.length).toBe(2 ** depth);
  });

  it('rejects ragged nesting with the offending position', () => {
    expect(() => read('[[1, 2], [3]]')).toThrow('ragged nesting at $[1]: expected shape (2), got (1)');
    expect(() => read('[1, [2]]')).toThrow('ragged nesting at $[1]: expected shape (), got (1)');
  });

  it('rejects values that are not numbers', () => {
    expect(() => read('["a", "b"]')).toThrow('expected a number or nested arrays of numbers');
    expect(() => read('{"x": 1}')).toThrow('expected a number or nested arrays of numbers');
  });

  it('rejects malformed JSON', () => {
    expect(() => read('[1, 2')).toThrow(SyntaxError);
  });
});
