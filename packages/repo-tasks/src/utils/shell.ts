/**
 * User-facing output for tasks.
 */

import chalk from 'chalk';

export interface Shell {
  info(message: string): void;
  error(message: string): void;
}

export const consoleShell: Shell = {
  info(message) {
    console.log(message);
  },
  error(message) {
    console.error(chalk.red(message));
  },
};
