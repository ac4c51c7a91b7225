import type { NDArray } from "../NDArray.ts";

/**
 * A decoder for one serialized array format.
 * `canRead` sees the path and the raw file bytes; `read` throws on malformed content.
 */
export interface ArrayReader {
  readonly name: string;
  canRead(path: string, head: Uint8Array): boolean;
  read(bytes: Uint8Array, path: string): NDArray;
}
