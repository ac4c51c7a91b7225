/**
 * Builders for .npy fixtures, so tests never depend on files made elsewhere
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export interface NpyFixtureOptions {
  fortranOrder?: boolean;
  version?: 1 | 2 | 3;
}

function formatShape(shape: number[]): string {
  if (shape.length === 1) return `(${shape[0]},)`;
  return `(${shape.join(', ')})`;
}

/**
 * Assemble a complete .npy file around an already-encoded payload.
 * The header is padded so the data starts on a 64-byte boundary, like NumPy does.
 */
export function npyBytes(
  descr: string,
  shape: number[],
  payload: Uint8Array,
  { fortranOrder = false, version = 1 }: NpyFixtureOptions = {}
): Uint8Array {
  const preamble = version === 1 ? 10 : 12;
  let header = `{'descr': '${descr}', 'fortran_order': ${fortranOrder ? 'True' : 'False'}, 'shape': ${formatShape(shape)}, }`;
  const padding = (64 - ((preamble + header.length + 1) % 64)) % 64;
  header = `${header}${' '.repeat(padding)}\n`;

  const out = new Uint8Array(preamble + header.length + payload.length);
  out.set([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, version, 0]);
  const view = new DataView(out.buffer);
  if (version === 1) {
    view.setUint16(8, header.length, true);
  } else {
    view.setUint32(8, header.length, true);
  }
  out.set(new TextEncoder().encode(header), preamble);
  out.set(payload, preamble + header.length);
  return out;
}

type Setter = (view: DataView, offset: number, value: number, littleEndian: boolean) => void;

function encode(values: number[], itemSize: number, set: Setter, littleEndian: boolean): Uint8Array {
  const view = new DataView(new ArrayBuffer(values.length * itemSize));
  values.forEach((value, i) => set(view, i * itemSize, value, littleEndian));
  return new Uint8Array(view.buffer);
}

export const float64Payload = (values: number[], littleEndian = true): Uint8Array =>
  encode(values, 8, (view, offset, value, le) => view.setFloat64(offset, value, le), littleEndian);

export const float32Payload = (values: number[], littleEndian = true): Uint8Array =>
  encode(values, 4, (view, offset, value, le) => view.setFloat32(offset, value, le), littleEndian);

export const int16Payload = (values: number[], littleEndian = true): Uint8Array =>
  encode(values, 2, (view, offset, value, le) => view.setInt16(offset, value, le), littleEndian);

export const int32Payload = (values: number[], littleEndian = true): Uint8Array =>
  encode(values, 4, (view, offset, value, le) => view.setInt32(offset, value, le), littleEndian);

export const int64Payload = (values: number[], littleEndian = true): Uint8Array =>
  encode(values, 8, (view, offset, value, le) => view.setBigInt64(offset, BigInt(value), le), littleEndian);

/** A little-endian float64 .npy file */
export const npyFloat64 = (values: number[], shape: number[] = [values.length]): Uint8Array =>
  npyBytes('<f8', shape, float64Payload(values));

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'ndplot-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(dir: string, name: string, contents: Uint8Array | string): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, contents);
  return filePath;
}
