/**
 * Console logger and report styler for the terminal
 */

import chalk from 'chalk';
import { LogLevel, Logger, Styler, createLogger } from 'ecosys-audit';

export function createConsoleLogger(level: LogLevel): Logger {
  return createLogger(level, (severity, message) => {
    switch (severity) {
      case 'error':
        console.error(chalk.red(message));
        break;
      case 'warn':
        console.error(chalk.yellow(message));
        break;
      case 'debug':
        console.error(chalk.gray(`  ${message}`));
        break;
      default:
        console.error(message);
    }
  });
}

export const chalkStyler: Styler = {
  ok: (text) => chalk.green(text),
  bad: (text) => chalk.red(text),
  warn: (text) => chalk.yellow(text),
  dim: (text) => chalk.gray(text),
  bold: (text) => chalk.bold(text)
};
