// source/utilities/logger.ts
// Colored stderr logger shared by the handler and the request listener.

import chalk from 'chalk';

const debugEnabled = (): boolean => Boolean(process.env.DEBUG);

const write = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

const debug = (...message: string[]): void => {
  if (debugEnabled()) write(chalk.gray('DEBUG:', ...message));
};

const warn = (...message: string[]): void => {
  write(chalk.yellow('WARNING:', ...message));
};

const error = (...message: string[]): void => {
  write(chalk.red('ERROR:', ...message));
};

export const logger = { debug, warn, error };
