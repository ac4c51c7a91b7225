/**
 * CLI help message
 */

import { HELP_EXAMPLES } from "./constants.ts";
import { createProgram } from "./parser.ts";

/**
 * Full usage text, as `--help` prints it
 */
export const formatHelp = (): string => {
  const program = createProgram({
    select: () => undefined,
    writeOut: () => undefined,
    writeErr: () => undefined
  });
  return `${program.helpInformation()}${HELP_EXAMPLES}`.trimEnd();
};
