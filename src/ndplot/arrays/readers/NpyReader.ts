/**
 * NpyReader - decodes NumPy .npy files (format versions 1.0, 2.0 and 3.0)
 *
 * Layout: magic "\x93NUMPY", major and minor version bytes, header length
 * (uint16 LE for 1.x, uint32 LE for 2.x/3.x), a dict-literal text header,
 * then the raw element data.
 */

import { createArray, isComplexDType, size, type DType, type NDArray } from "../NDArray.ts";
import type { ArrayReader } from "./types.ts";

export const NPY_MAGIC = new Uint8Array([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]);

export interface NpyHeader {
  dtype: DType;
  littleEndian: boolean;
  itemSize: number;
  fortranOrder: boolean;
  shape: number[];
  dataOffset: number;
}

const DESCR_TYPES: Record<string, DType> = {
  b1: 'bool',
  i1: 'int8',
  i2: 'int16',
  i4: 'int32',
  i8: 'int64',
  u1: 'uint8',
  u2: 'uint16',
  u4: 'uint32',
  u8: 'uint64',
  f4: 'float32',
  f8: 'float64',
  c8: 'complex64',
  c16: 'complex128',
};

export function hasNpyMagic(bytes: Uint8Array): boolean {
  if (bytes.length < NPY_MAGIC.length) return false;
  return NPY_MAGIC.every((byte, i) => bytes[i] === byte);
}

export function parseNpyHeader(bytes: Uint8Array): NpyHeader {
  if (!hasNpyMagic(bytes)) {
    throw new Error('missing NPY magic string');
  }
  if (bytes.length < 10) {
    throw new Error('file ends inside the NPY preamble');
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const major = bytes[6];
  let headerLength: number;
  let headerStart: number;

  if (major === 1) {
    headerLength = view.getUint16(8, true);
    headerStart = 10;
  } else if (major === 2 || major === 3) {
    if (bytes.length < 12) {
      throw new Error('file ends inside the NPY preamble');
    }
    headerLength = view.getUint32(8, true);
    headerStart = 12;
  } else {
    throw new Error(`unsupported NPY format version ${major}.${bytes[7]}`);
  }

  const dataOffset = headerStart + headerLength;
  if (dataOffset > bytes.length) {
    throw new Error('file ends inside the NPY header');
  }

  const encoding = major === 3 ? 'utf-8' : 'latin1';
  const header = new TextDecoder(encoding).decode(bytes.subarray(headerStart, dataOffset));

  const descrMatch = header.match(/'descr'\s*:\s*'([^']*)'/);
  if (!descrMatch) {
    throw new Error('header has no simple dtype descriptor (structured dtypes are not supported)');
  }
  const { dtype, littleEndian, itemSize } = parseDescr(descrMatch[1]);

  const fortranMatch = header.match(/'fortran_order'\s*:\s*(True|False)/);
  if (!fortranMatch) {
    throw new Error("header is missing 'fortran_order'");
  }

  const shapeMatch = header.match(/'shape'\s*:\s*\(([^)]*)\)/);
  if (!shapeMatch) {
    throw new Error("header is missing 'shape'");
  }

  return {
    dtype,
    littleEndian,
    itemSize,
    fortranOrder: fortranMatch[1] === 'True',
    shape: parseShape(shapeMatch[1]),
    dataOffset,
  };
}

function parseDescr(descr: string): Pick<NpyHeader, 'dtype' | 'littleEndian' | 'itemSize'> {
  const match = descr.match(/^([<>|=])([a-zA-Z])(\d+)$/);
  const dtype = match ? DESCR_TYPES[`${match[2]}${match[3]}`] : undefined;
  if (!match || !dtype) {
    throw new Error(`unsupported dtype '${descr}'`);
  }

  return {
    dtype,
    // '=' is native order; every host Node.js ships for is little-endian
    littleEndian: match[1] !== '>',
    itemSize: Number(match[3]),
  };
}

function parseShape(text: string): number[] {
  return text
    .split(',')
    .map(part => part.trim().replace(/L$/, ''))
    .filter(part => part !== '')
    .map(part => {
      if (!/^\d+$/.test(part)) {
        throw new Error(`invalid shape entry '${part}'`);
      }
      return Number(part);
    });
}

function decodeElements(bytes: Uint8Array, header: NpyHeader): { data: Float64Array; imag?: Float64Array } {
  const { dtype, littleEndian, itemSize, shape, dataOffset } = header;
  const count = size(shape);
  const byteLength = count * itemSize;

  if (bytes.length - dataOffset < byteLength) {
    throw new Error(`data is truncated: expected ${byteLength} bytes, found ${bytes.length - dataOffset}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset + dataOffset, byteLength);
  const data = new Float64Array(count);

  if (isComplexDType(dtype)) {
    const imag = new Float64Array(count);
    const half = itemSize / 2;
    for (let i = 0; i < count; i++) {
      const offset = i * itemSize;
      if (dtype === 'complex64') {
        data[i] = view.getFloat32(offset, littleEndian);
        imag[i] = view.getFloat32(offset + half, littleEndian);
      } else {
        data[i] = view.getFloat64(offset, littleEndian);
        imag[i] = view.getFloat64(offset + half, littleEndian);
      }
    }
    return { data, imag };
  }

  for (let i = 0; i < count; i++) {
    data[i] = readScalar(view, i * itemSize, dtype, littleEndian);
  }
  return { data };
}

function readScalar(view: DataView, offset: number, dtype: DType, littleEndian: boolean): number {
  switch (dtype) {
    case 'bool':
      return view.getUint8(offset) === 0 ? 0 : 1;
    case 'int8':
      return view.getInt8(offset);
    case 'int16':
      return view.getInt16(offset, littleEndian);
    case 'int32':
      return view.getInt32(offset, littleEndian);
    case 'int64':
      return Number(view.getBigInt64(offset, littleEndian));
    case 'uint8':
      return view.getUint8(offset);
    case 'uint16':
      return view.getUint16(offset, littleEndian);
    case 'uint32':
      return view.getUint32(offset, littleEndian);
    case 'uint64':
      return Number(view.getBigUint64(offset, littleEndian));
    case 'float32':
      return view.getFloat32(offset, littleEndian);
    case 'float64':
      return view.getFloat64(offset, littleEndian);
    case 'complex64':
    case 'complex128':
      throw new Error(`${dtype} is not a scalar type`);
  }
}

/**
 * Reorder column-major (Fortran) elements into row-major order.
 */
export function fortranToC(values: Float64Array, shape: readonly number[]): Float64Array {
  const out = new Float64Array(values.length);
  const cStrides = new Array<number>(shape.length);
  let stride = 1;
  for (let axis = shape.length - 1; axis >= 0; axis--) {
    cStrides[axis] = stride;
    stride *= shape[axis];
  }

  // Walk the Fortran buffer in storage order; the first axis varies fastest
  const index = new Array<number>(shape.length).fill(0);
  for (let f = 0; f < values.length; f++) {
    let c = 0;
    for (let axis = 0; axis < shape.length; axis++) {
      c += index[axis] * cStrides[axis];
    }
    out[c] = values[f];

    for (let axis = 0; axis < shape.length; axis++) {
      index[axis]++;
      if (index[axis] < shape[axis]) break;
      index[axis] = 0;
    }
  }

  return out;
}

export class NpyReader implements ArrayReader {
  readonly name = 'NPY';

  canRead(_path: string, head: Uint8Array): boolean {
    return hasNpyMagic(head);
  }

  read(bytes: Uint8Array): NDArray {
    const header = parseNpyHeader(bytes);
    const { data, imag } = decodeElements(bytes, header);

    if (header.fortranOrder && header.shape.length > 1) {
      return createArray(
        header.shape,
        header.dtype,
        fortranToC(data, header.shape),
        imag && fortranToC(imag, header.shape)
      );
    }

    return createArray(header.shape, header.dtype, data, imag);
  }
}
