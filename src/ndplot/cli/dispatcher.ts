/**
 * CLI command dispatcher
 */

import type { NDArray } from "../arrays/NDArray.ts";
import { deserializeArray } from "../arrays/deserializeArray.ts";
import {
  renderAsImage,
  renderAsLine,
  renderAsScatter,
  type ImagePlotOptions,
  type LinePlotOptions,
  type ScatterPlotOptions
} from "../render/index.ts";
import { UsageError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { PROGRAM_NAME } from "./constants.ts";
import { formatHelp } from "./help.ts";
import { parseArgs, type ParsedCommand } from "./parser.ts";

/**
 * The collaborators a dispatch calls into
 */
export interface CliDependencies {
  deserializeArray: (path: string) => Promise<NDArray>;
  renderAsImage: (array: NDArray, options: ImagePlotOptions) => Promise<void>;
  renderAsLine: (array: NDArray, options: LinePlotOptions) => Promise<void>;
  renderAsScatter: (array: NDArray, options: ScatterPlotOptions) => Promise<void>;
}

export const defaultDependencies: CliDependencies = {
  deserializeArray,
  renderAsImage,
  renderAsLine,
  renderAsScatter
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
};

/**
 * Main CLI entry point. Resolves to the exit code for help and usage
 * outcomes; load and render failures reject.
 */
export const runCli = async (
  args: readonly string[],
  deps: CliDependencies = defaultDependencies
): Promise<number> => {
  let parsed: ParsedCommand;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(`${error.message}\nRun '${PROGRAM_NAME} --help' for usage information`);
      return error.exitCode;
    }
    throw error;
  }

  switch (parsed.mode) {
    case 'none':
      logger.log(parsed.output ?? formatHelp());
      return 0;

    case 'image': {
      const array = await deps.deserializeArray(parsed.filePath);
      await deps.renderAsImage(array, parsed.options);
      return 0;
    }

    case 'line': {
      const array = await deps.deserializeArray(parsed.filePath);
      await deps.renderAsLine(array, parsed.options);
      return 0;
    }

    case 'scatter': {
      const array = await deps.deserializeArray(parsed.filePath);
      await deps.renderAsScatter(array, parsed.options);
      return 0;
    }

    default:
      return assertNever(parsed);
  }
};
