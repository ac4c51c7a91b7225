/* eslint-disable no-console */
/**
 * CLI logging utility with colors and formatting.
 * chalk drops the colors on its own for NO_COLOR and non-TTY streams.
 */

import chalk from 'chalk';

export const logger = {
  info(message: string): void {
    console.log(chalk.blue(`ℹ ${message}`));
  },

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  },

  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  },

  warn(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
  },

  // stderr, so debug lines never end up inside an SVG written to stdout
  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(chalk.dim(`🔍 ${message}`));
    }
  },

  log(message: string): void {
    console.log(message);
  },
};
