/**
 * CLI constants
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../../../package.json", import.meta.url), "utf8")));

export const VERSION = packageJson.version;

export const PROGRAM_NAME = 'ndplot';

export const HELP_EXAMPLES = `
Examples:
  $ ${PROGRAM_NAME} image phantom.npy
  $ ${PROGRAM_NAME} image kspace.npy --mode log --colormap viridis -o kspace.png
  $ ${PROGRAM_NAME} line signal.npy --points > signal.svg
  $ ${PROGRAM_NAME} scatter trajectory.npy -o trajectory.svg`;
