import { JsonReader } from "./JsonReader.ts";
import { NpyReader } from "./NpyReader.ts";
import type { ArrayReader } from "./types.ts";

export type { ArrayReader } from "./types.ts";
export { NpyReader } from "./NpyReader.ts";
export { JsonReader } from "./JsonReader.ts";

/** Tried in order; NPY is sniffed by its magic bytes, so it goes first */
export const DEFAULT_READERS: readonly ArrayReader[] = [new NpyReader(), new JsonReader()];
