/**
 * CLI argument parser
 *
 * A fresh commander program is built on every call, so parsing keeps no
 * state between invocations and never prints or exits on its own.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { COMPLEX_MODES, type ComplexMode } from "../arrays/NDArray.ts";
import type { Theme } from "../charts/BaseChart.ts";
import { COLORMAP_NAMES, resolveColormap } from "../charts/colormaps.ts";
import type { ImagePlotOptions, LinePlotOptions, ScatterPlotOptions } from "../render/index.ts";
import { UsageError } from "../utils/errors.ts";
import { HELP_EXAMPLES, PROGRAM_NAME, VERSION } from "./constants.ts";

export type PlotMode = 'image' | 'line' | 'scatter';

export type ParsedCommand =
  | { readonly mode: 'image'; readonly filePath: string; readonly options: ImagePlotOptions }
  | { readonly mode: 'line'; readonly filePath: string; readonly options: LinePlotOptions }
  | { readonly mode: 'scatter'; readonly filePath: string; readonly options: ScatterPlotOptions }
  /** No subcommand; `output` holds help or version text commander already produced */
  | { readonly mode: 'none'; readonly output?: string };

interface CommonOptionValues {
  output?: string;
  title?: string;
  theme?: Theme;
  width?: number;
  height?: number;
}

interface ImageOptionValues extends CommonOptionValues {
  colormap?: string;
  mode?: ComplexMode;
}

interface LineOptionValues extends CommonOptionValues {
  mode?: ComplexMode;
  points?: boolean;
}

interface ScatterOptionValues extends CommonOptionValues {
  pointSize?: number;
}

const THEMES: readonly Theme[] = ['light', 'dark'];

const parsePositiveInteger = (value: string): number => {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
};

const parsePositiveNumber = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

const parseColormap = (value: string): string => {
  if (!resolveColormap(value)) {
    throw new InvalidArgumentError(
      `Expected one of ${COLORMAP_NAMES.join(', ')}, a palette color, or a comma-separated list of colors.`
    );
  }
  return value;
};

function addCommonOptions(command: Command): Command {
  return command
    .option('-o, --output <file>', 'write the plot to a file (.svg, or .png) instead of stdout')
    .option('-t, --title <text>', 'chart title')
    .addOption(new Option('--theme <theme>', 'color theme (default: from NDPLOT_THEME or TERM)').choices(THEMES))
    .option('--width <px>', 'chart width in pixels', parsePositiveInteger)
    .option('--height <px>', 'chart height in pixels', parsePositiveInteger);
}

const commonPlotOptions = (values: CommonOptionValues) => ({
  output: values.output,
  title: values.title,
  theme: values.theme,
  width: values.width,
  height: values.height
});

export interface ProgramHooks {
  /** Called by the subcommand action that matched */
  select: (command: ParsedCommand) => void;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

/**
 * The commander program describing the CLI surface.
 */
export function createProgram(hooks: ProgramHooks): Command {
  const program = new Command();

  // Settings are copied onto subcommands when they are created, so they come first
  program
    .name(PROGRAM_NAME)
    .description('Plot a serialized array file (.npy or .json) as an image, a line plot or a scatter plot')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: hooks.writeOut, writeErr: hooks.writeErr })
    .addHelpText('after', HELP_EXAMPLES);

  addCommonOptions(
    program
      .command('image')
      .description('show a 2-D array (or its first 2-D slice) as an image')
      .argument('<filename>', 'serialized array file')
      .allowExcessArguments(false)
      .option('-c, --colormap <name>', `colormap: ${COLORMAP_NAMES.join(', ')}, a palette color, or colors "a,b,c"`, parseColormap)
      .addOption(new Option('-m, --mode <mode>', 'how values are projected before plotting').choices(COMPLEX_MODES).default('magnitude'))
  ).action((filename: string, values: ImageOptionValues) => {
    hooks.select({
      mode: 'image',
      filePath: filename,
      options: { ...commonPlotOptions(values), colormap: values.colormap, mode: values.mode }
    });
  });

  addCommonOptions(
    program
      .command('line')
      .description('plot each row along the last axis as a line')
      .argument('<filename>', 'serialized array file')
      .allowExcessArguments(false)
      .addOption(new Option('-m, --mode <mode>', 'how values are projected before plotting').choices(COMPLEX_MODES).default('real'))
      .option('--points', 'draw a marker at every sample')
  ).action((filename: string, values: LineOptionValues) => {
    hooks.select({
      mode: 'line',
      filePath: filename,
      options: { ...commonPlotOptions(values), mode: values.mode, points: values.points }
    });
  });

  addCommonOptions(
    program
      .command('scatter')
      .description('scatter complex values, (x, y) pairs along a last axis of length 2, or index against value')
      .argument('<filename>', 'serialized array file')
      .allowExcessArguments(false)
      .option('--point-size <px>', 'marker radius in pixels', parsePositiveNumber)
  ).action((filename: string, values: ScatterOptionValues) => {
    hooks.select({
      mode: 'scatter',
      filePath: filename,
      options: { ...commonPlotOptions(values), pointSize: values.pointSize }
    });
  });

  return program;
}

/**
 * Parse CLI arguments (without the node and script entries).
 * Throws UsageError for anything commander rejects.
 */
export const parseArgs = (argv: readonly string[]): ParsedCommand => {
  if (argv.length === 0) {
    return { mode: 'none' };
  }

  const result: { command?: ParsedCommand } = {};
  const stdout: string[] = [];
  const program = createProgram({
    select: command => {
      result.command = command;
    },
    writeOut: text => {
      stdout.push(text);
    },
    // The message travels in the thrown CommanderError instead
    writeErr: () => undefined
  });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    // --help, --version and `help` end the parse with exit code 0
    if (error.exitCode === 0) {
      return { mode: 'none', output: stdout.join('').trimEnd() };
    }
    throw new UsageError(error.message.replace(/^error:\s*/i, ''), { cause: error });
  }

  return result.command ?? { mode: 'none' };
};
