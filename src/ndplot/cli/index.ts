/**
 * CLI - Public API
 */

export { VERSION, PROGRAM_NAME } from "./constants.ts";
export { formatHelp } from "./help.ts";
export { createProgram, parseArgs } from "./parser.ts";
export type { ParsedCommand, PlotMode, ProgramHooks } from "./parser.ts";
export { runCli, defaultDependencies } from "./dispatcher.ts";
export type { CliDependencies } from "./dispatcher.ts";
