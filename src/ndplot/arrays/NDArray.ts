/**
 * NDArray - in-memory n-dimensional numeric array
 * Elements are stored row-major (C order) as doubles
 */

import { RenderError } from "../utils/errors.ts";

export type DType =
  | 'bool'
  | 'int8' | 'int16' | 'int32' | 'int64'
  | 'uint8' | 'uint16' | 'uint32' | 'uint64'
  | 'float32' | 'float64'
  | 'complex64' | 'complex128';

export interface NDArray {
  readonly shape: readonly number[];
  readonly dtype: DType;
  readonly data: Float64Array;
  /** Imaginary parts; present iff dtype is complex */
  readonly imag?: Float64Array;
}

/** How complex (or signed real) values are projected onto a plottable real number */
export type ComplexMode = 'magnitude' | 'phase' | 'real' | 'imag' | 'log';

export const COMPLEX_MODES: readonly ComplexMode[] = ['magnitude', 'phase', 'real', 'imag', 'log'];

export function isComplexDType(dtype: DType): boolean {
  return dtype === 'complex64' || dtype === 'complex128';
}

export function size(shape: readonly number[]): number {
  return shape.reduce((total, dim) => total * dim, 1);
}

export function createArray(
  shape: readonly number[],
  dtype: DType,
  data: Float64Array,
  imag?: Float64Array
): NDArray {
  const expected = size(shape);
  if (data.length !== expected) {
    throw new RangeError(`Array of shape (${shape.join(', ')}) needs ${expected} elements, got ${data.length}`);
  }
  if (isComplexDType(dtype) !== (imag !== undefined)) {
    throw new TypeError(`Imaginary parts must be given exactly for complex dtypes (dtype ${dtype})`);
  }
  if (imag && imag.length !== expected) {
    throw new RangeError(`Imaginary part has ${imag.length} elements, expected ${expected}`);
  }
  return { shape: [...shape], dtype, data, imag };
}

/**
 * Project every element through `mode`. Real arrays have a zero imaginary part.
 */
export function toReal(array: NDArray, mode: ComplexMode): Float64Array {
  const { data, imag } = array;
  const out = new Float64Array(data.length);

  for (let i = 0; i < data.length; i++) {
    const re = data[i];
    const im = imag ? imag[i] : 0;
    switch (mode) {
      case 'magnitude':
        out[i] = Math.hypot(re, im);
        break;
      case 'phase':
        out[i] = Math.atan2(im, re);
        break;
      case 'real':
        out[i] = re;
        break;
      case 'imag':
        out[i] = im;
        break;
      case 'log':
        out[i] = Math.log(Math.hypot(re, im));
        break;
    }
  }

  return out;
}

/**
 * Split a projected buffer into rows along the last axis.
 * A 0-d array becomes a single row of one element.
 */
export function lastAxisRows(shape: readonly number[], values: Float64Array): Float64Array[] {
  const rowLength = shape.length === 0 ? 1 : shape[shape.length - 1];
  if (rowLength === 0) return [];

  const rows: Float64Array[] = [];
  for (let start = 0; start < values.length; start += rowLength) {
    rows.push(values.subarray(start, start + rowLength));
  }
  return rows;
}

/**
 * First slice over every axis except the trailing `keep` axes:
 * arr[0, 0, ..., :, :] for keep = 2.
 */
export function leadingSlice(array: NDArray, keep: number): NDArray {
  if (array.shape.length < keep) {
    throw new RenderError(`Expected at least ${keep} dimensions, got shape (${array.shape.join(', ')})`);
  }
  if (array.shape.length === keep) return array;

  const shape = array.shape.slice(array.shape.length - keep);
  const length = size(shape);
  return createArray(
    shape,
    array.dtype,
    array.data.slice(0, length),
    array.imag?.slice(0, length)
  );
}
