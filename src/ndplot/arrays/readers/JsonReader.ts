/**
 * JsonReader - nested JSON arrays of numbers, e.g. [[1, 2], [3, 4]]
 */

import { z } from "zod";
import { createArray, type NDArray } from "../NDArray.ts";
import type { ArrayReader } from "./types.ts";

type Nested = number | Nested[];

const nestedNumbers: z.ZodType<Nested> = z.lazy(() =>
  z.union([z.number(), z.array(nestedNumbers)])
);

function shapeOf(value: Nested, path: string): number[] {
  if (typeof value === 'number') return [];
  if (value.length === 0) return [0];

  // Each item's shape is computed once and compared against item 0
  let inner: number[] = [];
  value.forEach((item, i) => {
    const itemShape = shapeOf(item, `${path}[${i}]`);
    if (i === 0) {
      inner = itemShape;
    } else if (itemShape.length !== inner.length || itemShape.some((dim, axis) => dim !== inner[axis])) {
      throw new Error(`ragged nesting at ${path}[${i}]: expected shape (${inner.join(', ')}), got (${itemShape.join(', ')})`);
    }
  });
  return [value.length, ...inner];
}

function flatten(value: Nested, out: number[]): void {
  if (typeof value === 'number') {
    out.push(value);
    return;
  }
  value.forEach(item => flatten(item, out));
}

export class JsonReader implements ArrayReader {
  readonly name = 'JSON';

  canRead(path: string): boolean {
    return path.toLowerCase().endsWith('.json');
  }

  read(bytes: Uint8Array): NDArray {
    const text = new TextDecoder('utf-8').decode(bytes);
    const parsed = nestedNumbers.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error('expected a number or nested arrays of numbers');
    }

    const shape = shapeOf(parsed.data, '$');
    const values: number[] = [];
    flatten(parsed.data, values);
    return createArray(shape, 'float64', Float64Array.from(values));
  }
}
