import chalk from 'chalk';

function debugEnabled(): boolean {
  return Boolean(process.env.FIBPAGER_DEBUG);
}

export const logger = {
  info(message: string): void {
    console.log(message);
  },
  success(message: string): void {
    console.log(chalk.green(message));
  },
  warn(message: string): void {
    console.warn(chalk.yellow(message));
  },
  error(message: string): void {
    console.error(chalk.red(message));
  },
  debug(message: string): void {
    if (debugEnabled()) {
      console.log(chalk.gray(`[debug] ${message}`));
    }
  },
  dim(message: string): void {
    console.log(chalk.dim(message));
  },
};
