/**
 * Load a serialized array file from disk
 */

import { open } from "node:fs/promises";
import { FileLoadError, getErrorMessage } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import type { NDArray } from "./NDArray.ts";
import { DEFAULT_READERS, type ArrayReader } from "./readers/index.ts";

function describeFsError(error: unknown): string {
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  switch (code) {
    case 'ENOENT':
      return 'file does not exist';
    case 'EACCES':
    case 'EPERM':
      return 'permission denied';
    case 'EISDIR':
      return 'path is a directory';
    default:
      return getErrorMessage(error);
  }
}

async function readArrayFile(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r').catch((error: unknown) => {
    throw new FileLoadError(path, describeFsError(error), { cause: error });
  });

  try {
    return await handle.readFile();
  } catch (error) {
    throw new FileLoadError(path, describeFsError(error), { cause: error });
  } finally {
    await handle.close();
  }
}

/**
 * Read `path` and decode it with the first reader that claims it.
 * Every failure surfaces as a FileLoadError naming the path.
 */
export async function deserializeArray(
  path: string,
  readers: readonly ArrayReader[] = DEFAULT_READERS
): Promise<NDArray> {
  const bytes = await readArrayFile(path);

  const reader = readers.find(candidate => candidate.canRead(path, bytes));
  if (!reader) {
    throw new FileLoadError(path, 'not a recognized array file (expected NPY or JSON)');
  }

  let array: NDArray;
  try {
    array = reader.read(bytes, path);
  } catch (error) {
    throw new FileLoadError(path, `invalid ${reader.name} file: ${getErrorMessage(error)}`, { cause: error });
  }

  logger.debug(`Loaded ${reader.name} array ${array.dtype} (${array.shape.join(', ')}) from ${path}`);
  return array;
}
