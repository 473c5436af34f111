/**
 * Logging capability handed to each component
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import { Logger } from './types';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Active spinner to clear before each line and redraw after */
  spinner?: Ora;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, spinner } = options;

  const write = (print: () => void) => {
    if (spinner?.isSpinning) {
      spinner.clear();
      print();
      spinner.render();
    } else {
      print();
    }
  };

  return {
    debug: (message) => {
      if (verbose) write(() => console.log(chalk.gray(message)));
    },
    info: (message) => write(() => console.log(message)),
    warn: (message) => write(() => console.warn(chalk.yellow(`⚠ ${message}`))),
    error: (message) => write(() => console.error(chalk.red(message))),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
