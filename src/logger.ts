import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  detail(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(chalk.blue('→'), message),
  success: (message) => console.log(chalk.green('✓'), message),
  warn: (message) => console.warn(chalk.yellow('⚠'), message),
  error: (message) => console.error(chalk.red('✗'), message),
  detail: (message) => console.log(chalk.gray(`  ${message}`))
};
