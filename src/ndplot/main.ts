/**
 * Process boundary: run the CLI and turn escaping errors into exit code 1
 */

import { runCli, type CliDependencies } from "./cli/index.ts";
import { getErrorMessage } from "./utils/errors.ts";
import { logger } from "./utils/logger.ts";

export const main = async (args: readonly string[], deps?: CliDependencies): Promise<number> => {
  try {
    return await runCli(args, deps);
  } catch (error) {
    logger.error(getErrorMessage(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  }
};
